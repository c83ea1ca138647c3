import { z } from 'zod';

import { defineTool, type ToolHandler } from '../server/registry.js';
import { FilterBuilder } from '../store/filters.js';
import type { CricketStore } from '../store/sqliteStore.js';
import type { ToolResult } from '../utils/types.js';

const VenueInfoArgs = z
  .object({
    venue_name: z.string().optional(),
    city: z.string().optional(),
  })
  .strict();

export type VenueInfoArgs = z.infer<typeof VenueInfoArgs>;

export class VenueProvider {
  constructor(private readonly store: CricketStore) {}

  getTools(): ToolHandler[] {
    return [
      defineTool({
        descriptor: {
          name: 'get_venue_info',
          description: 'Get information about cricket venues: matches hosted, wins by side and date range',
          inputSchema: {
            type: 'object',
            properties: {
              venue_name: {
                type: 'string',
                description: 'Name of the venue (partial, case-insensitive)',
              },
              city: {
                type: 'string',
                description: 'Filter by city (partial, case-insensitive)',
              },
            },
            additionalProperties: false,
          },
        },
        args: VenueInfoArgs,
        execute: (args) => this.getVenueInfo(args),
      }),
    ];
  }

  // Most-used venues first; ties fall back to the venue name.
  getVenueInfo(args: VenueInfoArgs): ToolResult {
    const filters = new FilterBuilder()
      .contains('m.venue', args.venue_name)
      .contains('m.city', args.city);

    const venues = this.store.all(
      `
      SELECT m.venue,
             MAX(m.city) AS city,
             COUNT(m.id) AS total_matches,
             COUNT(CASE WHEN m.winner = m.team1 THEN 1 END) AS team1_wins,
             COUNT(CASE WHEN m.winner = m.team2 THEN 1 END) AS team2_wins,
             GROUP_CONCAT(DISTINCT m.winner) AS teams_won,
             MIN(m.date) AS first_match_date,
             MAX(m.date) AS last_match_date
      FROM matches m
      ${filters.where()}
      GROUP BY m.venue
      ORDER BY total_matches DESC, m.venue ASC
      `,
      filters.params
    );

    return {
      venues,
      total_venues: venues.length,
    };
  }
}
