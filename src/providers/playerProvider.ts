import { z } from 'zod';

import { defineTool, type ToolHandler } from '../server/registry.js';
import { FilterBuilder } from '../store/filters.js';
import type { CricketStore } from '../store/sqliteStore.js';
import type { Row, ToolResult } from '../utils/types.js';

export const STAT_TYPES = ['batting', 'bowling', 'fielding', 'all'] as const;

const PlayerInfoArgs = z
  .object({
    player_name: z.string().optional(),
    team_name: z.string().optional(),
  })
  .strict();

const PlayerPerformanceArgs = z
  .object({
    player_name: z.string(),
    match_id: z.string().optional(),
    stat_type: z.enum(STAT_TYPES).default('all'),
  })
  .strict();

export type PlayerInfoArgs = z.infer<typeof PlayerInfoArgs>;
export type PlayerPerformanceArgs = z.output<typeof PlayerPerformanceArgs>;

export class PlayerProvider {
  constructor(private readonly store: CricketStore) {}

  /**
   * Get the tool definitions
   */
  getTools(): ToolHandler[] {
    return [
      defineTool({
        descriptor: {
          name: 'get_player_info',
          description: 'Get player information and team details, with career batting and bowling volume',
          inputSchema: {
            type: 'object',
            properties: {
              player_name: {
                type: 'string',
                description: 'Name of the player (partial, case-insensitive)',
              },
              team_name: {
                type: 'string',
                description: 'Filter by team name (partial, case-insensitive)',
              },
            },
            additionalProperties: false,
          },
        },
        args: PlayerInfoArgs,
        execute: (args) => this.getPlayerInfo(args),
      }),
      defineTool({
        descriptor: {
          name: 'get_player_performance',
          description: 'Get player batting and bowling performance in a specific match or overall',
          inputSchema: {
            type: 'object',
            properties: {
              player_name: {
                type: 'string',
                description: 'Player name (partial, case-insensitive)',
              },
              match_id: {
                type: 'string',
                description: 'Specific match ID',
              },
              stat_type: {
                type: 'string',
                description: 'Type of stats',
                enum: STAT_TYPES,
                default: 'all',
              },
            },
            required: ['player_name'],
            additionalProperties: false,
          },
        },
        args: PlayerPerformanceArgs,
        execute: (args) => this.getPlayerPerformance(args),
      }),
    ];
  }

  /**
   * List players with runs scored and deliveries faced or bowled
   */
  getPlayerInfo(args: PlayerInfoArgs): ToolResult {
    const filters = new FilterBuilder()
      .contains('p.name', args.player_name)
      .contains('p.team', args.team_name);

    const players = this.store.all(
      `
      SELECT p.*,
             COUNT(d.id) AS total_deliveries,
             COUNT(CASE WHEN d.batter = p.name THEN 1 END) AS balls_faced,
             COUNT(CASE WHEN d.bowler = p.name THEN 1 END) AS balls_bowled,
             COALESCE(SUM(CASE WHEN d.batter = p.name THEN d.runs_batter END), 0) AS total_runs,
             ROUND(AVG(CASE WHEN d.batter = p.name THEN d.runs_batter END), 2) AS avg_runs_per_delivery,
             COUNT(CASE WHEN d.batter = p.name AND d.runs_batter >= 4 THEN 1 END) AS boundaries
      FROM players p
      LEFT JOIN deliveries d ON d.batter = p.name OR d.bowler = p.name
      ${filters.where()}
      GROUP BY p.id
      ORDER BY total_runs DESC, p.name
      `,
      filters.params
    );

    return {
      players,
      total_players: players.length,
    };
  }

  /**
   * Aggregate batting and bowling figures for a player. `fielding` has no
   * block of its own, so on its own it yields an empty performance.
   */
  getPlayerPerformance(args: PlayerPerformanceArgs): ToolResult {
    const { player_name, match_id, stat_type } = args;
    const performance: Record<string, Row> = {};

    if (stat_type === 'batting' || stat_type === 'all') {
      performance.batting = this.battingFigures(player_name, match_id);
    }
    if (stat_type === 'bowling' || stat_type === 'all') {
      performance.bowling = this.bowlingFigures(player_name, match_id);
    }

    return {
      player_name,
      match_id: match_id ?? null,
      stat_type,
      performance,
    };
  }

  private battingFigures(playerName: string, matchId: string | undefined): Row {
    const filters = new FilterBuilder().contains('d.batter', playerName).equals('d.match_id', matchId);

    return (
      this.store.get(
        `
        SELECT COUNT(d.id) AS balls_faced,
               COALESCE(SUM(d.runs_batter), 0) AS runs_scored,
               COUNT(CASE WHEN d.runs_batter = 4 THEN 1 END) AS fours,
               COUNT(CASE WHEN d.runs_batter = 6 THEN 1 END) AS sixes,
               COUNT(CASE WHEN d.runs_batter >= 4 THEN 1 END) AS boundaries,
               ROUND(CAST(SUM(d.runs_batter) AS REAL) / NULLIF(COUNT(d.id), 0) * 100, 2) AS strike_rate,
               COUNT(DISTINCT d.match_id) AS matches_played
        FROM deliveries d
        ${filters.where()}
        `,
        filters.params
      ) ?? {}
    );
  }

  private bowlingFigures(playerName: string, matchId: string | undefined): Row {
    const filters = new FilterBuilder().contains('d.bowler', playerName).equals('d.match_id', matchId);

    return (
      this.store.get(
        `
        SELECT COUNT(d.id) AS balls_bowled,
               COALESCE(SUM(d.runs_total), 0) AS runs_conceded,
               COUNT(CASE WHEN d.wicket_type IS NOT NULL AND d.wicket_type != '' THEN 1 END) AS wickets,
               ROUND(CAST(SUM(d.runs_total) AS REAL) / NULLIF(COUNT(d.id), 0) * 6, 2) AS economy_rate,
               COUNT(DISTINCT d.match_id) AS matches_bowled
        FROM deliveries d
        ${filters.where()}
        `,
        filters.params
      ) ?? {}
    );
  }
}
