#!/usr/bin/env tsx
import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });
dotenv.config();

import { loadEnv, getDefaultSeason } from '../src/lib/server/env';
import { createRivalryServiceFromEnv } from '../src/lib/server/rivalry-service';

function flag(name: string): boolean {
  return process.argv.includes(`--${name}`);
}

function strFlag(name: string, def = ''): string {
  const p = process.argv.find((a) => a.startsWith(`--${name}=`));
  return p ? p.split('=')[1] : def;
}

async function main() {
  const username = strFlag('username');
  if (!username) {
    console.log('usage: rivalries --username=<sleeper name> [--season=2024] [--fast]');
    process.exitCode = 2;
    return;
  }
  const env = loadEnv(process.env);
  const season = strFlag('season', getDefaultSeason(env));
  const service = createRivalryServiceFromEnv(env);

  const found = await service.computeRivalriesForUsername(username, season, { mode: flag('fast') ? 'fast' : 'comprehensive' });
  if (!found) {
    console.log(`[rivalries] no Sleeper user named "${username}"`);
    process.exitCode = 1;
    return;
  }
  const { mostWinsAgainst, mostLossesTo, performance } = found.rivalries;
  const { summary } = found;
  console.log(
    `[rivalries] ${found.displayName} (${season}): ${summary.activeLeagues}/${summary.totalLeagues} active leagues, ` +
      `${summary.totalWins}-${summary.totalLosses} (${(summary.winPercentage * 100).toFixed(1)}%)`
  );
  console.log(
    JSON.stringify({ mostWinsAgainst, mostLossesTo, performance }, null, 2)
  );
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
