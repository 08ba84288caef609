export const INTERACTIONS_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS interactions (
    id BIGSERIAL PRIMARY KEY,
    timestamp TIMESTAMPTZ DEFAULT now(),
    session_id TEXT,
    user_id TEXT,
    kind TEXT NOT NULL,
    text_in TEXT,
    text_out TEXT,
    status TEXT NOT NULL DEFAULT 'success',
    metadata JSONB NOT NULL DEFAULT '{}'::jsonb
);
CREATE INDEX IF NOT EXISTS interactions_timestamp_idx ON interactions (timestamp);
CREATE INDEX IF NOT EXISTS interactions_session_idx ON interactions (session_id, id);

CREATE TABLE IF NOT EXISTS user_preferences (
    user_id TEXT NOT NULL,
    key TEXT NOT NULL,
    value TEXT NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    PRIMARY KEY (user_id, key)
);
`;
