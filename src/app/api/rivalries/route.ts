import { NextResponse } from 'next/server';
import { z } from 'zod';
import { RIVALRY_UNAVAILABLE_MESSAGE, RivalryUnavailableError } from '@/lib/rivalries/errors';
import { getDefaultSeason, loadEnv } from '@/lib/server/env';
import { getRivalryService } from '@/lib/server/rivalry-service';

const LeagueSummarySchema = z.object({
  leagueId: z.string().min(1),
  leagueName: z.string().default(''),
  totalGames: z.number().int().min(0),
});

const BodySchema = z
  .object({
    username: z.string().trim().min(1).optional(),
    accountId: z.string().trim().min(1).optional(),
    season: z.string().regex(/^\d{4}$/).optional(),
    mode: z.enum(['fast', 'comprehensive']).default('comprehensive'),
    leagues: z.array(LeagueSummarySchema).optional(),
  })
  .refine((b) => Boolean(b.username) || (Boolean(b.accountId) && b.leagues !== undefined), {
    message: 'Provide a username, or an accountId with its leagues',
  });

export async function POST(request: Request) {
  let json: unknown;
  try {
    json = await request.json();
  } catch {
    return NextResponse.json({ error: 'Invalid JSON body' }, { status: 400 });
  }
  const parsed = BodySchema.safeParse(json);
  if (!parsed.success) {
    return NextResponse.json({ error: 'Invalid request', issues: parsed.error.issues }, { status: 400 });
  }
  const body = parsed.data;

  try {
    const season = body.season ?? getDefaultSeason(loadEnv(process.env));
    const service = getRivalryService();
    const options = { mode: body.mode, signal: request.signal };

    if (body.accountId && body.leagues) {
      const rivalries = await service.computeRivalries(body.accountId, body.leagues, season, options);
      return NextResponse.json({ accountId: body.accountId, season, rivalries }, { status: 200 });
    }

    const username = body.username ?? '';
    const found = await service.computeRivalriesForUsername(username, season, options);
    if (!found) {
      return NextResponse.json({ error: `Manager "${username}" not found` }, { status: 404 });
    }
    return NextResponse.json(
      {
        accountId: found.account.accountId,
        displayName: found.displayName,
        season,
        totalLeagues: found.summary.totalLeagues,
        summary: found.summary,
        rivalries: found.rivalries,
      },
      { status: 200 }
    );
  } catch (e) {
    if (!(e instanceof RivalryUnavailableError)) console.error('rivalries API error', e);
    return NextResponse.json({ error: RIVALRY_UNAVAILABLE_MESSAGE }, { status: 503 });
  }
}
