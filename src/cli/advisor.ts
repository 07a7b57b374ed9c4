import 'dotenv/config';
import { Command } from 'commander';
import { Recommendation, Transaction } from '../core/types';
import { SettingsUpdate, settingsUpdateSchema } from '../core/schema';
import { ValidationError } from '../core/errors';
import { errorMessage } from '../core/utils';
import { Engine, PortfolioReport, buildEngine, buildPortfolioReport } from '../engine';

const money = (val: number) => val.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
const pct = (val: number) => `${(val * 100).toFixed(1)}%`;

export const formatRecommendation = (rec: Recommendation): string => {
  const lines = [
    `${rec.action} ${rec.quantity} ${rec.ticker} @ ${money(rec.price)} [${rec.status}, ${rec.source}]`,
    `  id: ${rec.id}`,
    `  risk: ${rec.riskLevel}, confidence: ${rec.confidence}%${rec.timeHorizon ? `, horizon: ${rec.timeHorizon}` : ''}`
  ];
  if (rec.stopLoss !== null || rec.takeProfit !== null) {
    lines.push(`  stop-loss: ${rec.stopLoss !== null ? money(rec.stopLoss) : '-'}, take-profit: ${rec.takeProfit !== null ? money(rec.takeProfit) : '-'}`);
  }
  if (rec.violations.length) {
    lines.push(`  risk violations: ${rec.violations.join(', ')}`);
  }
  lines.push(`  expires: ${rec.expiresAt}`);
  lines.push(...rec.reasoning.split('\n').map((l) => `  > ${l}`));
  return lines.join('\n');
};

export const formatTransaction = (t: Transaction): string =>
  `${t.timestamp} ${t.action} ${t.shares} ${t.ticker} @ ${money(t.price)} total ${money(t.totalAmount)} (fees ${money(
    t.commission + t.slippage
  )}, realized ${money(t.realizedPnl)})`;

export const formatReport = ({ summary, performance }: PortfolioReport): string => {
  const lines = [
    `Cash: ${money(summary.cash)}`,
    `Total value: ${money(summary.totalValue)} (P&L ${money(summary.pnl)}, ${summary.pnlPct.toFixed(2)}%)`,
    `Realized: ${money(summary.realizedPnl)}, unrealized: ${money(summary.unrealizedPnl)}`
  ];
  for (const p of summary.positions) {
    lines.push(
      `  ${p.ticker}: ${p.shares} @ avg ${money(p.avgPurchasePrice)}, now ${money(p.currentPrice)}, value ${money(
        p.marketValue
      )}, P&L ${money(p.unrealizedPnl)}`
    );
  }
  lines.push(
    `Trades: ${performance.trades} (${performance.buys} buy / ${performance.sells} sell), win rate ${pct(
      performance.winRate
    )}, max drawdown ${pct(performance.maxDrawdown)}`
  );
  return lines.join('\n');
};

const parseNumber = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`Not a number: ${value}`);
  }
  return parsed;
};

const parseSwitch = (value: string): boolean => {
  const lower = value.toLowerCase();
  if (['on', 'true', 'yes'].includes(lower)) return true;
  if (['off', 'false', 'no'].includes(lower)) return false;
  throw new ValidationError(`Expected on/off, got ${value}`);
};

const parseSettingsUpdate = (raw: Record<string, unknown>): SettingsUpdate => {
  const parsed = settingsUpdateSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`${issue?.path.join('.')}: ${issue?.message}`, issue?.path.join('.'));
  }
  return parsed.data;
};

export const buildProgram = (getEngine: () => Engine = () => buildEngine()): Command => {
  const program = new Command();
  program.name('advisor').description('Paper-trading advisor: recommendations, confirmations and portfolio');
  const run = (fn: (engine: Engine) => Promise<void>) => fn(getEngine());

  program
    .command('open <userId>')
    .description('open a paper account')
    .option('--capital <amount>', 'initial capital', parseNumber)
    .option('--username <name>', 'display name')
    .action((userId: string, opts: { capital?: number; username?: string }) =>
      run(async (engine) => {
        const result = await engine.ledger.openAccount(userId, { initialCapital: opts.capital, username: opts.username });
        console.log(
          result.created
            ? `Opened account for ${userId} with ${money(result.portfolio.initialCapital)}`
            : `Account for ${userId} already exists`
        );
      })
    );

  program
    .command('recommend <userId>')
    .description('get a recommendation')
    .option('--ticker <ticker>', 'instrument')
    .action((userId: string, opts: { ticker?: string }) =>
      run(async (engine) => {
        const rec = await engine.provider.getRecommendation(userId, opts.ticker ?? engine.config.defaultTicker);
        console.log(formatRecommendation(rec));
        const settings = await engine.ledger.getSettings(userId);
        if (settings.autoConfirm && rec.action !== 'HOLD' && rec.status === 'pending') {
          const result = await engine.executor.execute(rec.id, userId);
          console.log(result.ok ? `Auto-confirmed: ${formatTransaction(result.transaction)}` : `Auto-confirm failed: ${result.error} ${result.message}`);
        }
      })
    );

  program
    .command('confirm <userId> <recommendationId>')
    .description('execute a pending recommendation')
    .action((userId: string, recommendationId: string) =>
      run(async (engine) => {
        const result = await engine.executor.execute(recommendationId, userId);
        if (!result.ok) {
          console.error(`${result.error}: ${result.message}`);
          process.exitCode = 1;
          return;
        }
        console.log(formatTransaction(result.transaction));
      })
    );

  program
    .command('reject <userId> <recommendationId>')
    .description('decline a pending recommendation')
    .action((userId: string, recommendationId: string) =>
      run(async (engine) => {
        const result = await engine.provider.reject(recommendationId, userId);
        if (!result.ok) {
          console.error(`${result.error}: ${result.message}`);
          process.exitCode = 1;
          return;
        }
        console.log(`Rejected ${recommendationId}`);
      })
    );

  program
    .command('portfolio <userId>')
    .description('portfolio summary at current prices')
    .action((userId: string) =>
      run(async (engine) => {
        console.log(formatReport(await buildPortfolioReport(engine, userId)));
      })
    );

  program
    .command('history <userId>')
    .description('transaction history, or recommendation history with --recommendations')
    .option('--limit <n>', 'rows', parseNumber, 20)
    .option('--recommendations', 'list recommendations instead of transactions', false)
    .action((userId: string, opts: { limit: number; recommendations: boolean }) =>
      run(async (engine) => {
        if (opts.recommendations) {
          const rows = await engine.provider.listHistory(userId, opts.limit);
          console.log(rows.length ? rows.map(formatRecommendation).join('\n\n') : 'No recommendations yet');
          return;
        }
        const rows = await engine.ledger.getTransactionHistory(userId, opts.limit);
        console.log(rows.length ? rows.map(formatTransaction).join('\n') : 'No transactions yet');
      })
    );

  program
    .command('settings <userId>')
    .description('show or update risk settings')
    .option('--profile <profile>', 'conservative | moderate | aggressive')
    .option('--max-position <fraction>', 'max position size as a fraction of portfolio value', parseNumber)
    .option('--stop-loss <fraction>', 'minimum stop-loss distance', parseNumber)
    .option('--take-profit <fraction>', 'minimum take-profit distance', parseNumber)
    .option('--min-rr <ratio>', 'minimum reward/risk', parseNumber)
    .option('--auto-confirm <on|off>', 'execute actionable recommendations immediately', parseSwitch)
    .action(
      (
        userId: string,
        opts: {
          profile?: string;
          maxPosition?: number;
          stopLoss?: number;
          takeProfit?: number;
          minRr?: number;
          autoConfirm?: boolean;
        }
      ) =>
        run(async (engine) => {
          const raw: Record<string, unknown> = {
            riskProfile: opts.profile,
            maxPositionSizePct: opts.maxPosition,
            stopLossPct: opts.stopLoss,
            takeProfitPct: opts.takeProfit,
            minRiskRewardRatio: opts.minRr,
            autoConfirm: opts.autoConfirm
          };
          const provided = Object.fromEntries(Object.entries(raw).filter(([, v]) => v !== undefined));
          const settings = Object.keys(provided).length
            ? await engine.ledger.updateSettings(userId, parseSettingsUpdate(provided))
            : await engine.ledger.getSettings(userId);
          console.log(JSON.stringify(settings, null, 2));
        })
    );

  program
    .command('sweep')
    .description('expire overdue pending recommendations')
    .action(() =>
      run(async (engine) => {
        const expired = await engine.provider.sweepExpired();
        console.log(`Expired ${expired} recommendation(s)`);
      })
    );

  return program;
};

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err) => {
      console.error('advisor failed:', errorMessage(err));
      process.exitCode = 1;
    });
}
