import path from 'node:path'
import process from 'node:process'

export type AppConfig = {
  dataDir: string
  leagueId: string
  firebaseProjectId?: string
  credentialsPath?: string
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  return {
    dataDir: path.resolve(cwd, env.DATA_DIR || path.join('public', 'data')),
    leagueId: env.LEAGUE_ID || 'default',
    firebaseProjectId: env.FIREBASE_PROJECT_ID || undefined,
    credentialsPath: env.GOOGLE_APPLICATION_CREDENTIALS || undefined
  }
}
