import { buildProgram, formatRecommendation, formatTransaction } from '../src/cli/advisor';
import { Recommendation, Transaction } from '../src/core/types';
import { testEngine } from './helpers';

const rec: Recommendation = {
  id: 'rec_1',
  userId: 'u1',
  ticker: 'GAZP',
  action: 'BUY',
  quantity: 150,
  price: 170,
  stopLoss: 161.5,
  takeProfit: 187,
  reasoning: 'Trend intact',
  riskLevel: 'MEDIUM',
  confidence: 70,
  timeHorizon: 'days',
  keyFactors: [],
  status: 'pending',
  source: 'advisor',
  violations: [],
  createdAt: '2026-10-14T09:00:00.000Z',
  expiresAt: '2026-10-14T09:15:00.000Z'
};

describe('advisor CLI', () => {
  let logs: string[] = [];
  let errors: string[] = [];

  beforeEach(() => {
    logs = [];
    errors = [];
    jest.spyOn(console, 'log').mockImplementation((msg: string) => {
      logs.push(msg);
    });
    jest.spyOn(console, 'error').mockImplementation((msg: string) => {
      errors.push(msg);
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('formats a recommendation', () => {
    expect(formatRecommendation(rec)).toBe(
      [
        'BUY 150 GAZP @ 170.00 [pending, advisor]',
        '  id: rec_1',
        '  risk: MEDIUM, confidence: 70%, horizon: days',
        '  stop-loss: 161.50, take-profit: 187.00',
        '  expires: 2026-10-14T09:15:00.000Z',
        '  > Trend intact'
      ].join('\n')
    );
  });

  it('formats a downgraded HOLD with its violations', () => {
    const hold: Recommendation = {
      ...rec,
      action: 'HOLD',
      quantity: 0,
      stopLoss: null,
      takeProfit: null,
      timeHorizon: undefined,
      violations: ['POSITION_SIZE'],
      reasoning: 'Trend intact\nRisk check downgraded to HOLD (was BUY 200)'
    };
    expect(formatRecommendation(hold).split('\n')).toEqual([
      'HOLD 0 GAZP @ 170.00 [pending, advisor]',
      '  id: rec_1',
      '  risk: MEDIUM, confidence: 70%',
      '  risk violations: POSITION_SIZE',
      '  expires: 2026-10-14T09:15:00.000Z',
      '  > Trend intact',
      '  > Risk check downgraded to HOLD (was BUY 200)'
    ]);
  });

  it('formats a transaction', () => {
    const t: Transaction = {
      id: 'txn_1',
      portfolioId: 'pf_1',
      action: 'BUY',
      ticker: 'GAZP',
      shares: 150,
      price: 170,
      commission: 7.65,
      slippage: 12.75,
      totalAmount: 25520.4,
      realizedPnl: -20.4,
      recommendationId: 'rec_1',
      timestamp: '2026-10-14T09:00:00.000Z'
    };
    expect(formatTransaction(t)).toBe(
      '2026-10-14T09:00:00.000Z BUY 150 GAZP @ 170.00 total 25,520.40 (fees 20.40, realized -20.40)'
    );
  });

  it('opens an account, recommends and confirms', async () => {
    const engine = testEngine();
    const run = (...args: string[]) => buildProgram(() => engine).exitOverride().parseAsync(args, { from: 'user' });

    await run('open', 'u1');
    expect(logs).toEqual(['Opened account for u1 with 100,000.00']);

    await run('recommend', 'u1');
    const [created] = await engine.provider.listHistory('u1');
    expect(logs[1]).toBe(formatRecommendation(created));

    await run('confirm', 'u1', created.id);
    const [trade] = await engine.ledger.getTransactionHistory('u1');
    expect(logs[2]).toBe(formatTransaction(trade));

    await run('confirm', 'u1', created.id);
    expect(errors).toEqual([`ALREADY_RESOLVED: Recommendation ${created.id} is already confirmed`]);
    expect(process.exitCode).toBe(1);
  });

  it('updates settings from flags', async () => {
    const engine = testEngine();
    await engine.ledger.openAccount('u1');
    await buildProgram(() => engine)
      .exitOverride()
      .parseAsync(['settings', 'u1', '--max-position', '0.2', '--auto-confirm', 'on'], { from: 'user' });
    expect(JSON.parse(logs[0])).toMatchObject({ maxPositionSizePct: 0.2, autoConfirm: true, riskProfile: 'moderate' });
  });
});
