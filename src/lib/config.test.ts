import path from 'node:path'
import { describe, expect, it } from 'vitest'

import { loadConfig } from './config'

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({}, '/srv/app')).toEqual({
      dataDir: path.resolve('/srv/app', 'public', 'data'),
      leagueId: 'default',
      firebaseProjectId: undefined,
      credentialsPath: undefined
    })
  })

  it('reads overrides from the environment', () => {
    const config = loadConfig(
      {
        DATA_DIR: 'fixtures',
        LEAGUE_ID: 'office-2026',
        FIREBASE_PROJECT_ID: 'demo-project',
        GOOGLE_APPLICATION_CREDENTIALS: '/tmp/test-credentials.json'
      },
      '/srv/app'
    )
    expect(config).toEqual({
      dataDir: path.resolve('/srv/app', 'fixtures'),
      leagueId: 'office-2026',
      firebaseProjectId: 'demo-project',
      credentialsPath: '/tmp/test-credentials.json'
    })
  })
})
