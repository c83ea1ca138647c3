import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

const NameList = z.array(z.string());

const DeliverySchema = z.object({
  batter: z.string(),
  bowler: z.string(),
  non_striker: z.string(),
  runs: z.object({
    batter: z.number().int().default(0),
    extras: z.number().int().default(0),
    total: z.number().int().default(0),
  }),
  extras: z.record(z.number()).optional(),
  wickets: z
    .array(
      z.object({
        player_out: z.string(),
        kind: z.string(),
      })
    )
    .optional(),
});

const InningsSchema = z.object({
  team: z.string(),
  overs: z
    .array(
      z.object({
        over: z.number().int().min(0),
        deliveries: z.array(DeliverySchema),
      })
    )
    .default([]),
});

/** The subset of a Cricsheet JSON match file that the loader reads. */
export const MatchFileSchema = z.object({
  info: z.object({
    dates: z.array(z.string()).min(1),
    season: z.union([z.string(), z.number()]).optional(),
    city: z.string().optional(),
    venue: z.string().optional(),
    teams: z.tuple([z.string(), z.string()]),
    toss: z
      .object({
        winner: z.string().optional(),
        decision: z.string().optional(),
      })
      .optional(),
    outcome: z
      .object({
        winner: z.string().optional(),
        result: z.string().optional(),
        by: z
          .object({
            runs: z.number().int().optional(),
            wickets: z.number().int().optional(),
          })
          .optional(),
      })
      .default({}),
    officials: z.record(NameList).default({}),
    players: z.record(NameList).default({}),
    player_of_match: NameList.optional(),
  }),
  innings: z.array(InningsSchema).default([]),
});

export type MatchFile = z.infer<typeof MatchFileSchema>;
type DeliveryEntry = z.infer<typeof DeliverySchema>;

export interface DeliveryRecord {
  over: number;
  ball: number;
  batter: string;
  nonStriker: string;
  bowler: string;
  runsBatter: number;
  runsExtras: number;
  runsTotal: number;
  extrasType: string | null;
  wicketType: string | null;
  playerOut: string | null;
}

export interface InningsRecord {
  number: number;
  battingTeam: string;
  bowlingTeam: string;
  totalRuns: number;
  totalWickets: number;
  totalOvers: number;
  deliveries: DeliveryRecord[];
}

export interface MatchRecord {
  id: string;
  season: number | null;
  date: string;
  city: string | null;
  venue: string | null;
  team1: string;
  team2: string;
  tossWinner: string | null;
  tossDecision: string | null;
  winner: string | null;
  result: string;
  margin: string | null;
  playerOfMatch: string | null;
  players: { name: string; team: string }[];
  officials: { name: string; role: string }[];
  innings: InningsRecord[];
}

/** Initials of each word: "Coastal Kings" → "CK". */
export function shortName(team: string): string {
  return team
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word[0].toUpperCase())
    .join('');
}

function seasonOf(season: string | number | undefined, date: string): number | null {
  const year = /^\d{4}/.exec(String(season ?? date));
  return year ? Number(year[0]) : null;
}

function marginOf(by: { runs?: number; wickets?: number } | undefined): string | null {
  if (by?.runs !== undefined) {
    return `${by.runs} runs`;
  }
  if (by?.wickets !== undefined) {
    return `${by.wickets} wickets`;
  }
  return null;
}

// "umpires" → "umpire", "tv_umpires" → "tv_umpire"
function roleOf(key: string): string {
  return key.endsWith('s') ? key.slice(0, -1) : key;
}

function isLegal(delivery: DeliveryEntry): boolean {
  return delivery.extras?.wides === undefined && delivery.extras?.noballs === undefined;
}

/** Overs in `overs.balls` notation: 17 legal deliveries → 2.5. */
export function oversNotation(legalBalls: number): number {
  return Number((Math.floor(legalBalls / 6) + (legalBalls % 6) / 10).toFixed(1));
}

function toInnings(entry: z.infer<typeof InningsSchema>, index: number, teams: [string, string]): InningsRecord {
  const bowlingTeam = entry.team === teams[0] ? teams[1] : teams[0];
  const deliveries: DeliveryRecord[] = [];
  let legalBalls = 0;
  let totalWickets = 0;
  let totalRuns = 0;

  for (const over of entry.overs) {
    over.deliveries.forEach((delivery, position) => {
      const wicket = delivery.wickets?.[0];
      const extrasType = delivery.extras ? Object.keys(delivery.extras)[0] : undefined;
      deliveries.push({
        over: over.over,
        ball: position + 1,
        batter: delivery.batter,
        nonStriker: delivery.non_striker,
        bowler: delivery.bowler,
        runsBatter: delivery.runs.batter,
        runsExtras: delivery.runs.extras,
        runsTotal: delivery.runs.total,
        extrasType: extrasType ?? null,
        wicketType: wicket?.kind ?? null,
        playerOut: wicket?.player_out ?? null,
      });
      totalRuns += delivery.runs.total;
      totalWickets += delivery.wickets?.length ?? 0;
      if (isLegal(delivery)) {
        legalBalls += 1;
      }
    });
  }

  return {
    number: index + 1,
    battingTeam: entry.team,
    bowlingTeam,
    totalRuns,
    totalWickets,
    totalOvers: oversNotation(legalBalls),
    deliveries,
  };
}

/**
 * Decodes one match document. The match id is supplied by the caller,
 * normally the file's base name.
 */
export function parseMatch(id: string, document: unknown): MatchRecord {
  const parsed = MatchFileSchema.safeParse(document);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid match file ${id}: ${detail}`);
  }
  const { info, innings } = parsed.data;
  const [team1, team2] = info.teams;

  return {
    id,
    season: seasonOf(info.season, info.dates[0]),
    date: info.dates[0],
    city: info.city ?? null,
    venue: info.venue ?? null,
    team1,
    team2,
    tossWinner: info.toss?.winner ?? null,
    tossDecision: info.toss?.decision ?? null,
    winner: info.outcome.winner ?? null,
    result: info.outcome.result ?? 'normal',
    margin: marginOf(info.outcome.by),
    playerOfMatch: info.player_of_match?.join(', ') ?? null,
    players: Object.entries(info.players).flatMap(([team, names]) =>
      names.map((name) => ({ name, team }))
    ),
    officials: Object.entries(info.officials).flatMap(([key, names]) =>
      names.map((name) => ({ name, role: roleOf(key) }))
    ),
    innings: innings.map((entry, index) => toInnings(entry, index, info.teams)),
  };
}

export function loadMatchFile(filePath: string): MatchRecord {
  const id = path.basename(filePath, path.extname(filePath));
  const document: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return parseMatch(id, document);
}
