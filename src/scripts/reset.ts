/**
 * Reset the paper ledger
 *
 * Usage: npm run reset -- [startingFund] [--yes]
 */

import 'dotenv/config';

import { BotDatabase } from '../db/index.js';
import { FundLedger } from '../engine/fund-ledger.js';
import { describeError } from '../engine/errors.js';
import { loadConfig } from '../config.js';
import { formatSummary, parseFundAmount, promptLine } from '../operator.js';

async function main() {
  const config = loadConfig();
  if (!config.ok) {
    console.error(`[Reset] ${describeError(config.error)}`);
    process.exit(1);
  }

  const args = process.argv.slice(2);
  const skipConfirm = args.includes('--yes');
  const amountArg = args.find(arg => !arg.startsWith('--'));

  const db = new BotDatabase(config.value.databasePath);
  const ledger = new FundLedger(db, config.value.ledger);
  const { minFund, maxFund } = ledger.getConfig();

  try {
    const raw = amountArg ?? await promptLine(`New starting fund ($${minFund} - $${maxFund}): `);
    const amount = parseFundAmount(raw, minFund, maxFund);
    if (!amount.ok) {
      console.error(`[Reset] ${describeError(amount.error)}`);
      process.exitCode = 1;
      return;
    }

    const stats = db.getStats();
    const trades = stats.openTrades + stats.resolvedTrades;
    console.log(`[Reset] This deletes ${trades} trade records, ${stats.signals} signals and all daily P&L.`);

    if (!skipConfirm) {
      const answer = await promptLine("Type 'yes' to continue: ");
      if (answer.trim().toLowerCase() !== 'yes') {
        console.log('[Reset] Cancelled');
        return;
      }
    }

    const account = ledger.reset(amount.value);
    if (!account.ok) {
      console.error(`[Reset] ${describeError(account.error)}`);
      process.exitCode = 1;
      return;
    }

    console.log('[Reset] Ledger reset');
    for (const line of formatSummary(account.value)) console.log(`  ${line}`);
  } finally {
    db.close();
  }
}

main().catch(console.error);
