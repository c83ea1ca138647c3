import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { ingestDirectory } from '../src/loader/ingest.js';
import { createRegistry } from '../src/providers/index.js';
import { dispatch } from '../src/server/dispatcher.js';
import { SqliteStore } from '../src/store/sqliteStore.js';
import { callTool, createFixtureDb, type FixtureDb } from './_harness.js';

type Row = Record<string, string | number | null>;

interface TeamInfo {
  teams: Row[];
  total_teams: number;
}

interface PlayerInfo {
  players: Row[];
  total_players: number;
}

interface MatchDetails {
  matches: Row[];
  total_matches: number;
}

interface BallByBall {
  match_info: Row | null;
  deliveries: Row[];
  total_deliveries: number;
  overs_covered: number;
}

interface PlayerPerformance {
  player_name: string;
  match_id: string | null;
  stat_type: string;
  performance: Record<string, Row>;
}

interface MatchOfficials {
  officials: Row[];
  total_officials: number;
}

interface VenueInfo {
  venues: Row[];
  total_venues: number;
}

describe('cricket tools', () => {
  let fixture: FixtureDb;

  beforeAll(() => {
    fixture = createFixtureDb();
  });

  afterAll(() => {
    fixture.cleanup();
  });

  describe('get_team_info', () => {
    it('lists every team by name with wins and matches played', () => {
      const result = callTool<TeamInfo>(fixture.registry, 'get_team_info');
      expect(result).toEqual({
        teams: [
          { id: 1, name: 'Coastal Kings', short_name: 'CK', wins: 1, total_matches: 3 },
          { id: 2, name: 'Highland Riders', short_name: 'HR', wins: 1, total_matches: 3 },
        ],
        total_teams: 2,
      });
    });

    it('matches the short name case-insensitively', () => {
      const result = callTool<TeamInfo>(fixture.registry, 'get_team_info', { team_name: 'ck' });
      expect(result.teams.map((team) => team.name)).toEqual(['Coastal Kings']);
      expect(result.total_teams).toBe(1);
    });
  });

  describe('get_player_info', () => {
    it('orders players by runs scored', () => {
      const result = callTool<PlayerInfo>(fixture.registry, 'get_player_info');
      expect(result.total_players).toBe(4);
      expect(result.players.map((player) => [player.name, player.total_runs])).toEqual([
        ['K Ashwood', 8],
        ['S Cole', 7],
        ['M Brennan', 6],
        ['T Dawson', 0],
      ]);
    });

    it('splits deliveries into balls faced and bowled', () => {
      const result = callTool<PlayerInfo>(fixture.registry, 'get_player_info', { player_name: 'ashwood' });
      expect(result.players).toEqual([
        {
          id: 1,
          name: 'K Ashwood',
          team: 'Coastal Kings',
          total_deliveries: 8,
          balls_faced: 5,
          balls_bowled: 3,
          total_runs: 8,
          avg_runs_per_delivery: 1.6,
          boundaries: 1,
        },
      ]);
    });

    it('filters by team', () => {
      const result = callTool<PlayerInfo>(fixture.registry, 'get_player_info', { team_name: 'Riders' });
      expect(result.players.map((player) => player.name)).toEqual(['S Cole', 'T Dawson']);
    });
  });

  describe('get_match_details', () => {
    it('lists matches newest first', () => {
      const result = callTool<MatchDetails>(fixture.registry, 'get_match_details');
      expect(result.total_matches).toBe(3);
      expect(result.matches.map((match) => match.id)).toEqual(['1003', '1002', '1001']);
    });

    it('reports innings totals against the side that batted', () => {
      const result = callTool<MatchDetails>(fixture.registry, 'get_match_details', { match_id: '1002' });
      expect(result.matches).toHaveLength(1);
      expect(result.matches[0]).toMatchObject({
        team1: 'Highland Riders',
        team2: 'Coastal Kings',
        winner: 'Highland Riders',
        margin: '8 wickets',
        team1_runs: 2,
        team1_wickets: 0,
        team1_overs: 0.1,
        team2_runs: 1,
        team2_wickets: 0,
        team2_overs: 0.2,
        total_officials: 3,
      });
    });

    it('leaves scores null for a match without innings', () => {
      const result = callTool<MatchDetails>(fixture.registry, 'get_match_details', { match_id: '1003' });
      expect(result.matches[0]).toMatchObject({
        winner: null,
        result: 'no result',
        team1_runs: null,
        team2_runs: null,
        total_officials: 0,
      });
    });

    it('combines season, team and venue filters', () => {
      expect(
        callTool<MatchDetails>(fixture.registry, 'get_match_details', { season: 2024 }).matches.map((m) => m.id)
      ).toEqual(['1003', '1002']);
      expect(
        callTool<MatchDetails>(fixture.registry, 'get_match_details', { team_name: 'KINGS' }).total_matches
      ).toBe(3);
      expect(
        callTool<MatchDetails>(fixture.registry, 'get_match_details', { season: 2024, venue: 'summit' }).matches.map(
          (m) => m.id
        )
      ).toEqual(['1002']);
    });
  });

  describe('get_ball_by_ball', () => {
    it('orders deliveries by innings, over and ball', () => {
      const result = callTool<BallByBall>(fixture.registry, 'get_ball_by_ball', { match_id: '1001' });
      expect(result.deliveries.map((d) => [d.innings, d.over, d.ball])).toEqual([
        [1, 0, 1],
        [1, 0, 2],
        [1, 0, 3],
        [1, 0, 4],
        [1, 1, 1],
        [1, 1, 2],
        [2, 0, 1],
        [2, 0, 2],
        [2, 0, 3],
      ]);
      expect(result.total_deliveries).toBe(9);
      expect(result.overs_covered).toBe(3);
      expect(result.match_info).toMatchObject({ id: '1001', venue: 'Harbour Oval', margin: '9 runs' });
    });

    it('keeps the dismissal and extras on each delivery', () => {
      const result = callTool<BallByBall>(fixture.registry, 'get_ball_by_ball', { match_id: '1001', innings: 1 });
      expect(result.deliveries[2]).toMatchObject({ batter: 'M Brennan', extras_type: 'wides', runs_total: 1 });
      expect(result.deliveries[4]).toMatchObject({
        wicket_type: 'bowled',
        player_out: 'M Brennan',
        team1: 'Coastal Kings',
        team2: 'Highland Riders',
      });
    });

    it('applies the over range inclusively', () => {
      const fromOne = callTool<BallByBall>(fixture.registry, 'get_ball_by_ball', {
        match_id: '1001',
        innings: 1,
        over_start: 1,
      });
      expect(fromOne.deliveries.map((d) => d.batter)).toEqual(['M Brennan', 'K Ashwood']);
      expect(fromOne.overs_covered).toBe(1);

      const upToZero = callTool<BallByBall>(fixture.registry, 'get_ball_by_ball', { match_id: '1001', over_end: 0 });
      expect(upToZero.total_deliveries).toBe(7);
      expect(upToZero.overs_covered).toBe(2);
    });

    it('returns an explicit null match_info for an unknown match', () => {
      const result = callTool<BallByBall>(fixture.registry, 'get_ball_by_ball', { match_id: '9999' });
      expect(result).toEqual({ match_info: null, deliveries: [], total_deliveries: 0, overs_covered: 0 });
    });
  });

  describe('get_player_performance', () => {
    it('computes batting and bowling blocks by default', () => {
      const result = callTool<PlayerPerformance>(fixture.registry, 'get_player_performance', {
        player_name: 'Ashwood',
      });
      expect(result).toEqual({
        player_name: 'Ashwood',
        match_id: null,
        stat_type: 'all',
        performance: {
          batting: {
            balls_faced: 5,
            runs_scored: 8,
            fours: 1,
            sixes: 0,
            boundaries: 1,
            strike_rate: 160,
            matches_played: 2,
          },
          bowling: {
            balls_bowled: 3,
            runs_conceded: 5,
            wickets: 1,
            economy_rate: 10,
            matches_bowled: 1,
          },
        },
      });
    });

    it('returns only the requested block', () => {
      const result = callTool<PlayerPerformance>(fixture.registry, 'get_player_performance', {
        player_name: 'Ashwood',
        stat_type: 'bowling',
      });
      expect(Object.keys(result.performance)).toEqual(['bowling']);
    });

    it('yields a null rate when nothing was bowled', () => {
      const result = callTool<PlayerPerformance>(fixture.registry, 'get_player_performance', {
        player_name: 'Ashwood',
        match_id: '1002',
        stat_type: 'bowling',
      });
      expect(result.match_id).toBe('1002');
      expect(result.performance.bowling).toEqual({
        balls_bowled: 0,
        runs_conceded: 0,
        wickets: 0,
        economy_rate: null,
        matches_bowled: 0,
      });
    });

    it('yields a null strike rate for a player who never batted', () => {
      const result = callTool<PlayerPerformance>(fixture.registry, 'get_player_performance', {
        player_name: 'Nobody',
        stat_type: 'batting',
      });
      expect(result.performance.batting.strike_rate).toBeNull();
      expect(result.performance.batting.balls_faced).toBe(0);
    });

    it('treats fielding as an empty performance', () => {
      const result = callTool<PlayerPerformance>(fixture.registry, 'get_player_performance', {
        player_name: 'Brennan',
        stat_type: 'fielding',
      });
      expect(result.performance).toEqual({});
      expect(result.stat_type).toBe('fielding');
    });
  });

  describe('get_match_officials', () => {
    it('orders by match date, then role and name', () => {
      const result = callTool<MatchOfficials>(fixture.registry, 'get_match_officials');
      expect(result.officials.map((o) => [o.match_id, o.role, o.name])).toEqual([
        ['1002', 'tv_umpire', 'V Third'],
        ['1002', 'umpire', 'P Umpire'],
        ['1002', 'umpire', 'U Umpire'],
        ['1001', 'match_referee', 'R Referee'],
        ['1001', 'umpire', 'P Umpire'],
        ['1001', 'umpire', 'Q Umpire'],
      ]);
      expect(result.total_officials).toBe(6);
    });

    it('joins the match columns onto each official', () => {
      const result = callTool<MatchOfficials>(fixture.registry, 'get_match_officials', {
        match_id: '1001',
        official_name: 'p umpire',
      });
      expect(result.officials).toEqual([
        {
          id: 2,
          match_id: '1001',
          name: 'P Umpire',
          role: 'umpire',
          date: '2023-04-01',
          venue: 'Harbour Oval',
          team1: 'Coastal Kings',
          team2: 'Highland Riders',
        },
      ]);
    });
  });

  describe('get_venue_info', () => {
    it('orders venues by matches hosted', () => {
      const result = callTool<VenueInfo>(fixture.registry, 'get_venue_info');
      expect(result).toEqual({
        venues: [
          {
            venue: 'Harbour Oval',
            city: 'Port City',
            total_matches: 2,
            team1_wins: 1,
            team2_wins: 0,
            teams_won: 'Coastal Kings',
            first_match_date: '2023-04-01',
            last_match_date: '2024-05-12',
          },
          {
            venue: 'Summit Park',
            city: 'Hill Town',
            total_matches: 1,
            team1_wins: 1,
            team2_wins: 0,
            teams_won: 'Highland Riders',
            first_match_date: '2024-05-10',
            last_match_date: '2024-05-10',
          },
        ],
        total_venues: 2,
      });
    });

    it('filters by city', () => {
      const result = callTool<VenueInfo>(fixture.registry, 'get_venue_info', { city: 'hill' });
      expect(result.venues.map((v) => v.venue)).toEqual(['Summit Park']);
    });

    it('matches wildcard characters literally', () => {
      const result = callTool<VenueInfo>(fixture.registry, 'get_venue_info', { venue_name: '%' });
      expect(result.total_venues).toBe(0);
    });
  });

  it('returns identical payloads for repeated calls', () => {
    const request = {
      method: 'tools/call',
      params: { name: 'get_ball_by_ball', arguments: { match_id: '1001' } },
    };
    const first = dispatch(fixture.registry, { ...request, id: 1 });
    const second = dispatch(fixture.registry, { ...request, id: 2 });
    expect(first).toBeDefined();
    expect(JSON.stringify(second && 'result' in second ? second.result : null)).toBe(
      JSON.stringify(first && 'result' in first ? first.result : null)
    );
  });
});

describe('get_venue_info with tied venues', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cricket-venues-'));
    const matchesDir = path.join(dir, 'matches');
    fs.mkdirSync(matchesDir);
    // Zeta is loaded first so insertion order cannot produce the expected order.
    const venues: [string, string][] = [
      ['2001', 'Zeta Ground'],
      ['2002', 'Alpha Ground'],
    ];
    for (const [id, venue] of venues) {
      const match = {
        info: {
          dates: ['2024-04-01'],
          city: 'Port City',
          venue,
          teams: ['Coastal Kings', 'Highland Riders'],
          outcome: { result: 'no result' },
        },
      };
      fs.writeFileSync(path.join(matchesDir, `${id}.json`), JSON.stringify(match));
    }
    ingestDirectory(path.join(dir, 'ipl.db'), matchesDir);
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('orders venues with equal match counts by name', () => {
    const registry = createRegistry(new SqliteStore(path.join(dir, 'ipl.db')));
    const result = callTool<VenueInfo>(registry, 'get_venue_info');
    expect(result.venues.map((v) => [v.venue, v.total_matches])).toEqual([
      ['Alpha Ground', 1],
      ['Zeta Ground', 1],
    ]);
    expect(result.total_venues).toBe(2);
  });
});
