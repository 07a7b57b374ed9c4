import { EngineConfig, SessionClock } from './types';

export const formatISODate = (date: Date): string => date.toISOString().slice(0, 10);

export const addMinutes = (date: Date, minutes: number): Date => new Date(date.getTime() + minutes * 60_000);

// Wall-clock time in `tz`, returned as a Date whose UTC fields carry the local values.
const tzDate = (date: Date, tz: string): Date => {
  const iso = date.toLocaleString('sv-SE', { timeZone: tz }).replace(' ', 'T');
  return new Date(`${iso}Z`);
};

export const parseHHMM = (value: string): number => {
  const match = value.match(/^(\d{1,2}):(\d{2})$/);
  if (!match) {
    throw new Error(`Invalid HH:mm time: ${value}`);
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    throw new Error(`Invalid HH:mm time: ${value}`);
  }
  return hours * 60 + minutes;
};

/**
 * Position of `now` inside the exchange session. Outside the session one of the two
 * distances is negative; on a non-trading day both are.
 */
export const computeSessionClock = (now: Date, session: EngineConfig['session']): SessionClock => {
  const local = tzDate(now, session.timezone);
  const isTradingDay = session.tradingDays.includes(local.getUTCDay());
  const minuteOfDay = local.getUTCHours() * 60 + local.getUTCMinutes() + local.getUTCSeconds() / 60;
  const open = parseHHMM(session.open);
  const close = parseHHMM(session.close);
  if (!isTradingDay) {
    return { isTradingDay, minutesSinceOpen: -1, minutesUntilClose: -1 };
  }
  return {
    isTradingDay,
    minutesSinceOpen: minuteOfDay - open,
    minutesUntilClose: close - minuteOfDay
  };
};
