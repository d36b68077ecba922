/**
 * Timing rules for AI persona replies in forum threads.
 *
 * Every function takes `now` and a `random` source so schedules are
 * reproducible in tests.
 */

export type RandomSource = () => number;

/** Wait before a persona's next reply, indexed by replies already posted. */
export const REPLY_DELAYS_MINUTES: readonly number[] = [
  2, 5, 15, 30, 60, 120, 240, 480, 1440,
];

export const MIN_PARTICIPANTS = 3;
export const MAX_PARTICIPANTS = 5;

/** Schedules due within this window are not pulled forward by a bump. */
export const BUMP_THRESHOLD_MS = 2 * 60_000;

/** Number of completed replies shown to a persona as thread context. */
export const REPLY_CONTEXT_SIZE = 10;

const MINUTE_MS = 60_000;
const SECOND_MS = 1_000;

export function replyDelayMinutes(replyCount: number): number {
  const index = Math.min(
    Math.max(Math.floor(replyCount), 0),
    REPLY_DELAYS_MINUTES.length - 1,
  );
  return REPLY_DELAYS_MINUTES[index];
}

export function nextReplyAt(replyCount: number, now: Date): Date {
  return new Date(now.getTime() + replyDelayMinutes(replyCount) * MINUTE_MS);
}

/** Random subset of MIN..MAX participants, fewer when fewer exist. */
export function pickParticipants<T>(
  candidates: readonly T[],
  random: RandomSource = Math.random,
): T[] {
  const wanted =
    MIN_PARTICIPANTS +
    Math.floor(random() * (MAX_PARTICIPANTS - MIN_PARTICIPANTS + 1));
  const count = Math.min(wanted, candidates.length);

  // Fisher-Yates over a copy
  const pool = [...candidates];
  for (let i = pool.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  return pool.slice(0, count);
}

/** First reply of the i-th participant: 2 + i minutes plus up to 1 more. */
export function initialReplyAt(
  index: number,
  now: Date,
  random: RandomSource = Math.random,
): Date {
  const minutes = 2 + index + random();
  return new Date(now.getTime() + minutes * MINUTE_MS);
}

/**
 * A schedule cleared to null has a reply job in flight and is never
 * bumped; one already due within the threshold keeps its time.
 */
export function shouldBump(scheduledAt: Date | null, now: Date): boolean {
  return (
    scheduledAt !== null &&
    scheduledAt.getTime() - now.getTime() > BUMP_THRESHOLD_MS
  );
}

/** Bumped time of the i-th schedule: 60 + 20i seconds plus up to 10 more. */
export function bumpedReplyAt(
  index: number,
  now: Date,
  random: RandomSource = Math.random,
): Date {
  const seconds = 60 + index * 20 + Math.floor(random() * 11);
  return new Date(now.getTime() + seconds * SECOND_MS);
}
