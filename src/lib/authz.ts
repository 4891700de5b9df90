export type ActorRole = 'admin' | 'lecturer' | 'student'

export interface Actor {
  id: string
  role: ActorRole
}

const ADMIN_ROLES = new Set<ActorRole>(['admin'])
const MEMBER_ROLES = new Set<ActorRole>(['admin', 'lecturer', 'student'])

export function ensureAdminActor(actor: Actor | null) {
  if (!actor || !ADMIN_ROLES.has(actor.role)) {
    return null
  }

  return actor
}

export function requireAdminActor(actor: Actor | null) {
  const admin = ensureAdminActor(actor)

  if (!admin) {
    throw new Error('Administrator role is required.')
  }

  return admin
}

export function ensureMemberActor(actor: Actor | null) {
  if (!actor || !MEMBER_ROLES.has(actor.role)) {
    return null
  }

  return actor
}

export function requireMemberActor(actor: Actor | null) {
  const member = ensureMemberActor(actor)

  if (!member) {
    throw new Error('Sign in to continue.')
  }

  return member
}
