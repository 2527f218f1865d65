export type Member = {
  id: string
  name: string
  handle?: string
  email?: string
  isAdmin?: boolean
}

export type CompetitionTeam = {
  id: string
  name: string
  memberIds: string[]
}

export type MembersFile = {
  members: Member[]
  teams?: CompetitionTeam[]
}
