/**
 * Interaction context
 *
 * Translates a Discord interaction into the platform-neutral CommandContext
 * the refinery commands take.
 */

import { PermissionFlagsBits, type ChatInputCommandInteraction } from 'discord.js'
import type { Database } from 'better-sqlite3'
import type { CommandContext, RefineryConfig } from '../types/index.js'
import type { CommandRateLimiter } from '../services/rate-limit.js'

/** Dependencies every command handler receives */
export interface CommandDeps {
  db: Database
  config: RefineryConfig
  rateLimiter: CommandRateLimiter
}

interface RoleCache {
  cache: { some(predicate: (role: { id: string }) => boolean): boolean }
}

/** The parts of an interaction the admin check looks at */
export interface AdminCheckSubject {
  user: { id: string }
  memberPermissions: { has(permission: bigint): boolean } | null
  member: { roles: string[] | RoleCache } | null
}

/**
 * Check if the invoking user is a refinery admin
 *
 * Checks: REFINERY_ADMIN_USERS (user IDs), Discord's Administrator or
 * Manage Server permission, then REFINERY_ADMIN_ROLES (role IDs)
 */
export function isRefineryAdmin(interaction: AdminCheckSubject, config: RefineryConfig): boolean {
  if (config.adminUserIds.includes(interaction.user.id)) {
    return true
  }

  const permissions = interaction.memberPermissions
  if (permissions && (permissions.has(PermissionFlagsBits.Administrator) || permissions.has(PermissionFlagsBits.ManageGuild))) {
    return true
  }

  if (config.adminRoleIds.length === 0) {
    return false
  }

  const memberRoles = interaction.member?.roles
  if (!memberRoles) {
    return false
  }

  // Handle both GuildMemberRoleManager (has cache) and string[] (API response)
  if (Array.isArray(memberRoles)) {
    return memberRoles.some(roleId => config.adminRoleIds.includes(roleId))
  }
  return memberRoles.cache.some(role => config.adminRoleIds.includes(role.id))
}

/**
 * Best display name we know for the invoking user
 */
export function displayNameOf(interaction: Pick<ChatInputCommandInteraction, 'user' | 'member'>): string {
  const member = interaction.member
  if (member && 'displayName' in member && typeof member.displayName === 'string') {
    return member.displayName
  }
  return interaction.user.globalName ?? interaction.user.username
}

/**
 * Display name of another guild member, from the cache only
 */
export function cachedMemberName(interaction: ChatInputCommandInteraction, userId: string): string | null {
  const member = interaction.guild?.members.cache.get(userId)
  if (member) {
    return member.displayName
  }
  const user = interaction.client.users.cache.get(userId)
  return user ? user.globalName ?? user.username : null
}

/**
 * Build the CommandContext for an interaction
 */
export function commandContext(interaction: ChatInputCommandInteraction, config: RefineryConfig): CommandContext {
  return {
    userId: interaction.user.id,
    username: displayNameOf(interaction),
    isAdmin: isRefineryAdmin(interaction, config),
  }
}
