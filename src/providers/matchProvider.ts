import { z } from 'zod';

import { defineTool, type ToolHandler } from '../server/registry.js';
import { FilterBuilder } from '../store/filters.js';
import type { CricketStore } from '../store/sqliteStore.js';
import type { Row, ToolResult } from '../utils/types.js';

const MatchDetailsArgs = z
  .object({
    match_id: z.string().optional(),
    season: z.number().int().optional(),
    team_name: z.string().optional(),
    venue: z.string().optional(),
  })
  .strict();

const BallByBallArgs = z
  .object({
    match_id: z.string(),
    innings: z.number().int().min(1).optional(),
    over_start: z.number().int().min(0).optional(),
    over_end: z.number().int().min(0).optional(),
  })
  .strict();

const MatchOfficialsArgs = z
  .object({
    match_id: z.string().optional(),
    official_name: z.string().optional(),
  })
  .strict();

export type MatchDetailsArgs = z.infer<typeof MatchDetailsArgs>;
export type BallByBallArgs = z.infer<typeof BallByBallArgs>;
export type MatchOfficialsArgs = z.infer<typeof MatchOfficialsArgs>;

/** Number of distinct (innings, over) pairs among the deliveries. */
export function countOversCovered(deliveries: Row[]): number {
  return new Set(deliveries.map((row) => `${row.innings}:${row.over}`)).size;
}

export class MatchProvider {
  constructor(private readonly store: CricketStore) {}

  /**
   * Get the tool definitions
   */
  getTools(): ToolHandler[] {
    return [
      defineTool({
        descriptor: {
          name: 'get_match_details',
          description: 'Get detailed match information including scores and outcome',
          inputSchema: {
            type: 'object',
            properties: {
              match_id: {
                type: 'string',
                description: 'Specific match ID',
              },
              season: {
                type: 'integer',
                description: 'IPL season year',
              },
              team_name: {
                type: 'string',
                description: 'Filter by either team (partial, case-insensitive)',
              },
              venue: {
                type: 'string',
                description: 'Filter by venue (partial, case-insensitive)',
              },
            },
            additionalProperties: false,
          },
        },
        args: MatchDetailsArgs,
        execute: (args) => this.getMatchDetails(args),
      }),
      defineTool({
        descriptor: {
          name: 'get_ball_by_ball',
          description: 'Get ball-by-ball deliveries for a match',
          inputSchema: {
            type: 'object',
            properties: {
              match_id: {
                type: 'string',
                description: 'Match ID',
              },
              innings: {
                type: 'integer',
                description: 'Innings number (1 or 2)',
                minimum: 1,
              },
              over_start: {
                type: 'integer',
                description: 'Starting over number (inclusive, 0-based)',
                minimum: 0,
              },
              over_end: {
                type: 'integer',
                description: 'Ending over number (inclusive, 0-based)',
                minimum: 0,
              },
            },
            required: ['match_id'],
            additionalProperties: false,
          },
        },
        args: BallByBallArgs,
        execute: (args) => this.getBallByBall(args),
      }),
      defineTool({
        descriptor: {
          name: 'get_match_officials',
          description: 'Get match officials information',
          inputSchema: {
            type: 'object',
            properties: {
              match_id: {
                type: 'string',
                description: 'Match ID',
              },
              official_name: {
                type: 'string',
                description: 'Official name (partial, case-insensitive)',
              },
            },
            additionalProperties: false,
          },
        },
        args: MatchOfficialsArgs,
        execute: (args) => this.getMatchOfficials(args),
      }),
    ];
  }

  /**
   * List matches, newest first, with each side's innings totals
   */
  getMatchDetails(args: MatchDetailsArgs): ToolResult {
    const filters = new FilterBuilder()
      .equals('m.id', args.match_id)
      .equals('m.season', args.season)
      .contains(['m.team1', 'm.team2'], args.team_name)
      .contains('m.venue', args.venue);

    // Innings are joined by batting side, not by innings number, so team1_*
    // always describes team1 whichever side batted first.
    const matches = this.store.all(
      `
      SELECT m.*,
             i1.total_runs AS team1_runs,
             i1.total_wickets AS team1_wickets,
             i1.total_overs AS team1_overs,
             i2.total_runs AS team2_runs,
             i2.total_wickets AS team2_wickets,
             i2.total_overs AS team2_overs,
             COUNT(o.id) AS total_officials
      FROM matches m
      LEFT JOIN innings i1 ON i1.match_id = m.id AND i1.batting_team = m.team1
      LEFT JOIN innings i2 ON i2.match_id = m.id AND i2.batting_team = m.team2
      LEFT JOIN officials o ON o.match_id = m.id
      ${filters.where()}
      GROUP BY m.id
      ORDER BY m.date DESC, m.id
      `,
      filters.params
    );

    return {
      matches,
      total_matches: matches.length,
    };
  }

  /**
   * Deliveries of one match in bowling order, with the match row alongside
   */
  getBallByBall(args: BallByBallArgs): ToolResult {
    const filters = new FilterBuilder()
      .equals('d.match_id', args.match_id)
      .equals('d.innings', args.innings)
      .atLeast('d.over', args.over_start)
      .atMost('d.over', args.over_end);

    const deliveries = this.store.all(
      `
      SELECT d.*, m.team1, m.team2
      FROM deliveries d
      JOIN matches m ON m.id = d.match_id
      ${filters.where()}
      ORDER BY d.innings, d.over, d.ball
      `,
      filters.params
    );

    const matchInfo = this.store.get('SELECT * FROM matches WHERE id = ?', [args.match_id]);

    return {
      match_info: matchInfo ?? null,
      deliveries,
      total_deliveries: deliveries.length,
      overs_covered: countOversCovered(deliveries),
    };
  }

  getMatchOfficials(args: MatchOfficialsArgs): ToolResult {
    const filters = new FilterBuilder()
      .equals('o.match_id', args.match_id)
      .contains('o.name', args.official_name);

    const officials = this.store.all(
      `
      SELECT o.*, m.date, m.venue, m.team1, m.team2
      FROM officials o
      LEFT JOIN matches m ON m.id = o.match_id
      ${filters.where()}
      ORDER BY m.date DESC, o.role, o.name
      `,
      filters.params
    );

    return {
      officials,
      total_officials: officials.length,
    };
  }
}
