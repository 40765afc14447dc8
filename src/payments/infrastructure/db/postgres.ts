import { Pool } from "pg";

export type PostgresConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
};

export const createPool = (config: PostgresConfig): Pool => {
  return new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database
  });
};

export const LEDGER_PRIMARY_KEY = "ledger_records_pkey";

// Accounts are owned by the account service; the table is created here only
// so a fresh database can accept webhooks.
export const initSchema = async (pool: Pool): Promise<void> => {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS accounts (
      id INTEGER PRIMARY KEY,
      owner_user_id INTEGER NOT NULL,
      balance NUMERIC(14, 2) NOT NULL DEFAULT 0 CHECK (balance >= 0),
      created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS ledger_records (
      transaction_id VARCHAR(100) NOT NULL,
      account_id INTEGER NOT NULL REFERENCES accounts(id),
      amount NUMERIC(14, 2) NOT NULL CHECK (amount > 0),
      status TEXT NOT NULL CHECK (status IN ('APPLIED', 'REJECTED')),
      applied_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
      CONSTRAINT ${LEDGER_PRIMARY_KEY} PRIMARY KEY (transaction_id)
    );
  `);

  await pool.query(
    "CREATE INDEX IF NOT EXISTS ledger_records_account_id_idx ON ledger_records (account_id, applied_at DESC);"
  );
};
