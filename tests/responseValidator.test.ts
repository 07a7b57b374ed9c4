import { extractJsonObject, parseAdvisorResponse } from '../src/strategy/responseValidator';
import { ParseError } from '../src/core/errors';
import { ACCEPTABLE_BUY, advisorJson } from './helpers';

const errorOf = (raw: string) => {
  const res = parseAdvisorResponse(raw);
  if (res.ok) throw new Error('expected a parse failure');
  return res.error;
};

describe('advisor response validation', () => {
  it('maps a well-formed answer to a proposal', () => {
    expect(parseAdvisorResponse(ACCEPTABLE_BUY)).toEqual({
      ok: true,
      value: {
        action: 'BUY',
        quantity: 150,
        price: 170,
        stopLoss: 161.5,
        takeProfit: 187,
        reasoning: 'Trend intact',
        riskLevel: 'MEDIUM',
        confidence: 70,
        timeHorizon: 'days',
        keyFactors: []
      }
    });
  });

  it('recovers the object from a fenced block surrounded by prose', () => {
    const res = parseAdvisorResponse(`Here is my view:\n\`\`\`json\n${ACCEPTABLE_BUY}\n\`\`\`\nGood luck!`);
    expect(res.ok && res.value.quantity).toBe(150);
  });

  it('skips braces that sit inside strings when extracting', () => {
    const raw = `Sure! ${advisorJson({ reasoning: 'range {tight} with "quotes"' })} Anything else?`;
    const res = parseAdvisorResponse(raw);
    expect(res.ok && res.value.reasoning).toBe('range {tight} with "quotes"');
    expect(extractJsonObject('a {"b": "}"} c')).toBe('{"b": "}"}');
    expect(extractJsonObject('{"open": ')).toBeUndefined();
  });

  it('coerces numeric strings and lower-case enums', () => {
    const res = parseAdvisorResponse(
      advisorJson({ action: 'buy', quantity: '150', price: '170.00', stop_loss: '161.5', take_profit: '187', risk_level: 'low', confidence: '70' })
    );
    expect(res).toMatchObject({ ok: true, value: { action: 'BUY', quantity: 150, price: 170, riskLevel: 'LOW', confidence: 70 } });
  });

  it('clears quantity and levels on HOLD', () => {
    const res = parseAdvisorResponse(advisorJson({ quantity: 5, stop_loss: 150, take_profit: 190, time_horizon: null }));
    expect(res).toMatchObject({ ok: true, value: { action: 'HOLD', quantity: 0, stopLoss: null, takeProfit: null } });
    expect(res.ok && res.value.timeHorizon).toBeUndefined();
  });

  it('rejects text with no object in it', () => {
    const err = errorOf('I cannot help with that.');
    expect(err).toBeInstanceOf(ParseError);
    expect(err.field).toBe('response');
    expect(err.message).toBe('response: no JSON object found');
    expect(errorOf('{"action": "BUY", ').message).toBe('response: no JSON object found');
    expect(errorOf('[1, 2]').message).toBe('response: expected a JSON object');
  });

  it('names the first offending field', () => {
    expect(errorOf(advisorJson({ action: 'BUY', quantity: 10 })).message).toBe('stop_loss: is required for BUY');
    expect(errorOf(advisorJson({ action: 'BUY', quantity: 10, stop_loss: 175, take_profit: 190 })).message).toBe(
      'stop_loss: must be below price for BUY'
    );
    expect(errorOf(advisorJson({ action: 'BUY', quantity: 10, stop_loss: 160, take_profit: 165 })).message).toBe(
      'take_profit: must be above price for BUY'
    );
    expect(errorOf(advisorJson({ action: 'SELL', quantity: 0 })).message).toBe(
      'quantity: must be a positive integer for SELL'
    );
    expect(errorOf(advisorJson({ confidence: 150 })).message).toBe('confidence: Number must be less than or equal to 100');
    expect(errorOf(advisorJson({ risk_level: 'EXTREME' })).field).toBe('risk_level');
    expect(errorOf(advisorJson({ reasoning: undefined })).message).toBe('reasoning: Required');
  });
});
