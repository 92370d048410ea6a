/**
 * Lyrics Output Classifier
 *
 * The tagger's lyrics plugin exposes no structured status, so the outcome
 * of a fetch is read from its exit code and captured text. All of that
 * guessing lives here; the worker only sees a `LyricsOutcome`.
 *
 * Outcomes:
 * - found: lyrics were written to the track
 * - not-found: the backend answered but had nothing (not a failure)
 * - quota-exceeded: the backend throttled us; triggers a cooldown and requeue
 * - failed: anything else, counted against the retry ledger
 */

import { CommandResult } from '../process/CommandRunner.js';

export type LyricsOutcome = 'found' | 'not-found' | 'quota-exceeded' | 'failed';

/** Any single match means the quota is exhausted */
const QUOTA_MARKERS = ['429', 'Too Many Requests'];

const FOUND_MARKERS = ['lyrics found'];

const NOT_FOUND_MARKERS = ['not found', 'no lyrics'];

function containsAny(text: string, markers: readonly string[], caseSensitive: boolean): boolean {
  const haystack = caseSensitive ? text : text.toLowerCase();
  return markers.some(marker => haystack.includes(caseSensitive ? marker : marker.toLowerCase()));
}

/**
 * Classify one lyrics fetch. Quota markers win over everything else,
 * including a zero exit code.
 */
export function classifyLyricsOutput(result: Pick<CommandResult, 'exitCode' | 'output' | 'timedOut'>): LyricsOutcome {
  if (containsAny(result.output, QUOTA_MARKERS, true)) {
    return 'quota-exceeded';
  }

  if (result.timedOut) {
    return 'failed';
  }

  if (result.exitCode === 0 || containsAny(result.output, FOUND_MARKERS, false)) {
    return 'found';
  }

  if (containsAny(result.output, NOT_FOUND_MARKERS, false)) {
    return 'not-found';
  }

  return 'failed';
}
