import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';

import { SCHEMA_SQL } from '../store/schema.js';
import { debugLog } from '../utils/logger.js';
import { loadMatchFile, shortName, type MatchRecord } from './matchFile.js';

export function createSchema(db: Database.Database): void {
  db.exec(SCHEMA_SQL);
}

/**
 * Writes one match and everything under it. Rows previously loaded for the
 * same match id are replaced, so loading a file twice changes nothing.
 */
export function ingestMatch(db: Database.Database, match: MatchRecord): void {
  const insertMatch = db.prepare(`
    INSERT OR REPLACE INTO matches
    (id, season, date, city, venue, team1, team2, toss_winner, toss_decision, winner, result, margin, player_of_match)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const insertTeam = db.prepare('INSERT OR IGNORE INTO teams (name, short_name) VALUES (?, ?)');
  const insertPlayer = db.prepare('INSERT OR IGNORE INTO players (name, team) VALUES (?, ?)');
  const insertInnings = db.prepare(`
    INSERT INTO innings
    (match_id, innings_number, batting_team, bowling_team, total_runs, total_wickets, total_overs)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);
  const insertDelivery = db.prepare(`
    INSERT INTO deliveries (
      match_id, innings, batting_team, bowling_team,
      over, ball, batter, non_striker, bowler,
      runs_batter, runs_extras, runs_total,
      extras_type, wicket_type, player_out
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const insertOfficial = db.prepare('INSERT INTO officials (match_id, name, role) VALUES (?, ?, ?)');

  const write = db.transaction((record: MatchRecord) => {
    for (const table of ['deliveries', 'innings', 'officials']) {
      db.prepare(`DELETE FROM ${table} WHERE match_id = ?`).run(record.id);
    }

    insertMatch.run(
      record.id,
      record.season,
      record.date,
      record.city,
      record.venue,
      record.team1,
      record.team2,
      record.tossWinner,
      record.tossDecision,
      record.winner,
      record.result,
      record.margin,
      record.playerOfMatch
    );

    for (const team of [record.team1, record.team2]) {
      insertTeam.run(team, shortName(team));
    }
    for (const player of record.players) {
      insertPlayer.run(player.name, player.team);
    }
    for (const official of record.officials) {
      insertOfficial.run(record.id, official.name, official.role);
    }

    for (const innings of record.innings) {
      insertInnings.run(
        record.id,
        innings.number,
        innings.battingTeam,
        innings.bowlingTeam,
        innings.totalRuns,
        innings.totalWickets,
        innings.totalOvers
      );
      for (const delivery of innings.deliveries) {
        insertDelivery.run(
          record.id,
          innings.number,
          innings.battingTeam,
          innings.bowlingTeam,
          delivery.over,
          delivery.ball,
          delivery.batter,
          delivery.nonStriker,
          delivery.bowler,
          delivery.runsBatter,
          delivery.runsExtras,
          delivery.runsTotal,
          delivery.extrasType,
          delivery.wicketType,
          delivery.playerOut
        );
      }
    }
  });

  write(match);
}

/**
 * Loads every `*.json` match file in `dataDir` (in name order) into the
 * database at `dbPath`, creating the schema when it is missing.
 */
export function ingestDirectory(dbPath: string, dataDir: string): number {
  const files = fs
    .readdirSync(dataDir)
    .filter((file) => path.extname(file) === '.json')
    .sort();

  const db = new Database(dbPath);
  try {
    createSchema(db);
    for (const file of files) {
      const filePath = path.join(dataDir, file);
      debugLog('Loading:', filePath);
      ingestMatch(db, loadMatchFile(filePath));
    }
  } finally {
    db.close();
  }
  return files.length;
}
