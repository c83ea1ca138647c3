// Tables written by the loader and read by the tool providers.
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS matches (
    id TEXT PRIMARY KEY,
    season INTEGER,
    date TEXT,
    city TEXT,
    venue TEXT,
    team1 TEXT,
    team2 TEXT,
    toss_winner TEXT,
    toss_decision TEXT,
    winner TEXT,
    result TEXT,
    margin TEXT,
    player_of_match TEXT
);

CREATE TABLE IF NOT EXISTS teams (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    short_name TEXT
);

CREATE TABLE IF NOT EXISTS players (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    team TEXT NOT NULL,
    UNIQUE (name, team)
);

CREATE TABLE IF NOT EXISTS innings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    match_id TEXT NOT NULL REFERENCES matches (id),
    innings_number INTEGER NOT NULL,
    batting_team TEXT,
    bowling_team TEXT,
    total_runs INTEGER,
    total_wickets INTEGER,
    total_overs REAL,
    UNIQUE (match_id, innings_number)
);

CREATE TABLE IF NOT EXISTS deliveries (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    match_id TEXT NOT NULL REFERENCES matches (id),
    innings INTEGER NOT NULL,
    batting_team TEXT,
    bowling_team TEXT,
    over INTEGER NOT NULL,
    ball INTEGER NOT NULL,
    batter TEXT,
    non_striker TEXT,
    bowler TEXT,
    runs_batter INTEGER,
    runs_extras INTEGER,
    runs_total INTEGER,
    extras_type TEXT,
    wicket_type TEXT,
    player_out TEXT
);

CREATE INDEX IF NOT EXISTS idx_deliveries_match ON deliveries (match_id, innings, over, ball);
CREATE INDEX IF NOT EXISTS idx_deliveries_batter ON deliveries (batter);
CREATE INDEX IF NOT EXISTS idx_deliveries_bowler ON deliveries (bowler);

CREATE TABLE IF NOT EXISTS officials (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    match_id TEXT NOT NULL REFERENCES matches (id),
    name TEXT NOT NULL,
    role TEXT NOT NULL
);
`;
