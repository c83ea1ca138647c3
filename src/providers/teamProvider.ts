import { z } from 'zod';

import { defineTool, type ToolHandler } from '../server/registry.js';
import { FilterBuilder } from '../store/filters.js';
import type { CricketStore } from '../store/sqliteStore.js';
import type { ToolResult } from '../utils/types.js';

const TeamInfoArgs = z
  .object({
    team_name: z.string().optional(),
  })
  .strict();

export type TeamInfoArgs = z.infer<typeof TeamInfoArgs>;

export class TeamProvider {
  constructor(private readonly store: CricketStore) {}

  /**
   * Get the tool definitions
   */
  getTools(): ToolHandler[] {
    return [
      defineTool({
        descriptor: {
          name: 'get_team_info',
          description: 'Get information about IPL teams, with wins and matches played',
          inputSchema: {
            type: 'object',
            properties: {
              team_name: {
                type: 'string',
                description: 'Name or short name of the team (partial, case-insensitive)',
              },
            },
            additionalProperties: false,
          },
        },
        args: TeamInfoArgs,
        execute: (args) => this.getTeamInfo(args),
      }),
    ];
  }

  /**
   * List teams with their win and match counts
   */
  getTeamInfo(args: TeamInfoArgs): ToolResult {
    const filters = new FilterBuilder().contains(['t.name', 't.short_name'], args.team_name);

    const teams = this.store.all(
      `
      SELECT t.*,
             COUNT(CASE WHEN m.winner = t.name THEN 1 END) AS wins,
             COUNT(m.id) AS total_matches
      FROM teams t
      LEFT JOIN matches m ON (m.team1 = t.name OR m.team2 = t.name)
      ${filters.where()}
      GROUP BY t.id
      ORDER BY t.name
      `,
      filters.params
    );

    return {
      teams,
      total_teams: teams.length,
    };
  }
}
