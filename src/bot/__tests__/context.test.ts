import { describe, it, expect } from 'vitest'
import { PermissionFlagsBits, PermissionsBitField } from 'discord.js'
import { isRefineryAdmin, type AdminCheckSubject } from '../context.js'
import type { RefineryConfig } from '../../types/index.js'

const baseConfig: RefineryConfig = {
  port: 0,
  databasePath: ':memory:',
  serviceTokens: [],
  discordToken: null,
  devGuildId: null,
  guildName: 'Test Guild',
  defaultSandPerMelange: 50,
  defaultGuildCutPct: 10,
  storageTimeoutMs: 5000,
  rateLimit: { maxInvocations: 5, windowSeconds: 60 },
  adminUserIds: [],
  adminRoleIds: [],
}

function subject(overrides: Partial<AdminCheckSubject> = {}): AdminCheckSubject {
  return {
    user: { id: '100' },
    memberPermissions: new PermissionsBitField(PermissionFlagsBits.SendMessages),
    member: { roles: [] },
    ...overrides,
  }
}

describe('isRefineryAdmin', () => {
  it('denies ordinary members', () => {
    expect(isRefineryAdmin(subject(), baseConfig)).toBe(false)
  })

  it('allows configured admin user ids', () => {
    expect(isRefineryAdmin(subject(), { ...baseConfig, adminUserIds: ['100'] })).toBe(true)
  })

  it('allows members who can manage the server', () => {
    expect(isRefineryAdmin(subject({ memberPermissions: new PermissionsBitField(PermissionFlagsBits.ManageGuild) }), baseConfig)).toBe(true)
    expect(isRefineryAdmin(subject({ memberPermissions: new PermissionsBitField(PermissionFlagsBits.Administrator) }), baseConfig)).toBe(true)
  })

  it('allows configured admin roles', () => {
    const config = { ...baseConfig, adminRoleIds: ['officer'] }

    expect(isRefineryAdmin(subject({ member: { roles: ['member', 'officer'] } }), config)).toBe(true)
    expect(isRefineryAdmin(subject({ member: { roles: ['member'] } }), config)).toBe(false)
  })

  it('denies role checks outside a guild', () => {
    const config = { ...baseConfig, adminRoleIds: ['officer'] }

    expect(isRefineryAdmin(subject({ member: null, memberPermissions: null }), config)).toBe(false)
  })
})
