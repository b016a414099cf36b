/**
 * SQLite Schema Definition
 */

export const SCHEMA = `
-- Users (Discord users who have been credited sand)
CREATE TABLE IF NOT EXISTS users (
  id TEXT PRIMARY KEY,
  username TEXT,
  sand_total INTEGER NOT NULL DEFAULT 0 CHECK (sand_total >= 0),
  melange_total INTEGER NOT NULL DEFAULT 0 CHECK (melange_total >= 0),
  -- Solo sand not yet refined, only valid at remainder_rate
  sand_remainder INTEGER NOT NULL DEFAULT 0 CHECK (sand_remainder >= 0),
  remainder_rate INTEGER CHECK (remainder_rate > 0),
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Runtime-configurable settings (conversion rate, default guild cut)
CREATE TABLE IF NOT EXISTS settings (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL,
  modified_by TEXT,
  modified_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Expeditions (one team split each, immutable)
CREATE TABLE IF NOT EXISTS expeditions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  initiator_id TEXT NOT NULL,
  initiator_username TEXT,
  total_sand INTEGER NOT NULL CHECK (total_sand >= 0),
  participant_count INTEGER NOT NULL CHECK (participant_count > 0),
  harvester_cut_pct REAL NOT NULL CHECK (harvester_cut_pct BETWEEN 0 AND 100),
  guild_cut_pct REAL NOT NULL DEFAULT 10.0 CHECK (guild_cut_pct BETWEEN 0 AND 100),
  sand_per_melange INTEGER NOT NULL CHECK (sand_per_melange > 0),
  guild_sand INTEGER NOT NULL CHECK (guild_sand >= 0),
  harvester_sand INTEGER NOT NULL CHECK (harvester_sand >= 0),
  per_participant_sand INTEGER NOT NULL CHECK (per_participant_sand >= 0),
  unallocated_sand INTEGER NOT NULL CHECK (unallocated_sand >= 0),
  landsraad_bonus INTEGER NOT NULL DEFAULT 0 CHECK (landsraad_bonus IN (0, 1)),
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  CHECK (guild_sand + harvester_sand + per_participant_sand * participant_count + unallocated_sand = total_sand)
);

-- Credits applied by an expedition (harvester may appear twice: once per role)
CREATE TABLE IF NOT EXISTS expedition_participants (
  expedition_id INTEGER NOT NULL REFERENCES expeditions(id) ON DELETE CASCADE,
  user_id TEXT NOT NULL REFERENCES users(id),
  username TEXT,
  role TEXT NOT NULL CHECK (role IN ('participant', 'harvester')),
  sand_amount INTEGER NOT NULL CHECK (sand_amount >= 0),
  melange_amount INTEGER NOT NULL CHECK (melange_amount >= 0),
  PRIMARY KEY (expedition_id, user_id, role)
);

-- Every sand credit a user received, with its payout status
-- Only paid_at / paid_by may change, and only once
CREATE TABLE IF NOT EXISTS deposits (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT NOT NULL REFERENCES users(id),
  username TEXT,
  deposit_type TEXT NOT NULL CHECK (deposit_type IN ('solo', 'expedition')),
  sand_amount INTEGER NOT NULL CHECK (sand_amount >= 0),
  melange_amount INTEGER NOT NULL CHECK (melange_amount >= 0),
  sand_per_melange INTEGER NOT NULL CHECK (sand_per_melange > 0),
  expedition_id INTEGER REFERENCES expeditions(id) ON DELETE RESTRICT,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  paid_at TEXT,
  paid_by TEXT,
  CHECK ((deposit_type = 'expedition') = (expedition_id IS NOT NULL))
);

-- Guild treasury (one row per guild)
CREATE TABLE IF NOT EXISTS guild_treasury (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  guild_name TEXT UNIQUE NOT NULL,
  total_sand INTEGER NOT NULL DEFAULT 0 CHECK (total_sand >= 0),
  total_melange INTEGER NOT NULL DEFAULT 0 CHECK (total_melange >= 0),
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Guild transactions (append-only audit log of treasury movements)
-- An expedition referenced here can never be deleted (RESTRICT)
CREATE TABLE IF NOT EXISTS guild_transactions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  guild_name TEXT NOT NULL REFERENCES guild_treasury(guild_name),
  transaction_type TEXT NOT NULL CHECK (transaction_type IN ('deposit', 'withdrawal')),
  sand_amount INTEGER NOT NULL CHECK (sand_amount >= 0),
  melange_amount INTEGER NOT NULL DEFAULT 0 CHECK (melange_amount >= 0),
  expedition_id INTEGER REFERENCES expeditions(id) ON DELETE RESTRICT,
  admin_user_id TEXT,
  admin_username TEXT,
  target_user_id TEXT,
  target_username TEXT,
  description TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Immutability guards
CREATE TRIGGER IF NOT EXISTS expeditions_immutable
BEFORE UPDATE ON expeditions
BEGIN
  SELECT RAISE(ABORT, 'expeditions are immutable');
END;

CREATE TRIGGER IF NOT EXISTS guild_transactions_no_update
BEFORE UPDATE ON guild_transactions
BEGIN
  SELECT RAISE(ABORT, 'guild transactions are append-only');
END;

CREATE TRIGGER IF NOT EXISTS guild_transactions_no_delete
BEFORE DELETE ON guild_transactions
BEGIN
  SELECT RAISE(ABORT, 'guild transactions are append-only');
END;

CREATE TRIGGER IF NOT EXISTS deposits_paid_once
BEFORE UPDATE ON deposits
WHEN OLD.paid_at IS NOT NULL
  OR NEW.paid_at IS NULL
  OR NEW.user_id IS NOT OLD.user_id
  OR NEW.deposit_type IS NOT OLD.deposit_type
  OR NEW.sand_amount IS NOT OLD.sand_amount
  OR NEW.melange_amount IS NOT OLD.melange_amount
  OR NEW.sand_per_melange IS NOT OLD.sand_per_melange
  OR NEW.expedition_id IS NOT OLD.expedition_id
  OR NEW.created_at IS NOT OLD.created_at
BEGIN
  SELECT RAISE(ABORT, 'deposits only change by being paid');
END;

CREATE TRIGGER IF NOT EXISTS deposits_no_delete
BEFORE DELETE ON deposits
BEGIN
  SELECT RAISE(ABORT, 'deposits are append-only');
END;

-- Indexes for common queries
CREATE INDEX IF NOT EXISTS idx_users_leaderboard ON users(melange_total DESC, sand_total DESC, id);
CREATE INDEX IF NOT EXISTS idx_expedition_participants_user ON expedition_participants(user_id);
CREATE INDEX IF NOT EXISTS idx_deposits_user ON deposits(user_id, id);
CREATE INDEX IF NOT EXISTS idx_deposits_unpaid ON deposits(user_id) WHERE paid_at IS NULL;
CREATE INDEX IF NOT EXISTS idx_guild_transactions_type ON guild_transactions(guild_name, transaction_type);
CREATE INDEX IF NOT EXISTS idx_guild_transactions_created_at ON guild_transactions(created_at);
CREATE INDEX IF NOT EXISTS idx_guild_transactions_expedition_id ON guild_transactions(expedition_id);
`
