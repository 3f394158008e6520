/**
 * Score pipeline: the only writer of `State.score`.
 *
 * Updates queue up in `scoreEvents` and are drained here once per tick. The
 * last update wins, since each carries an absolute value.
 */

import type { ScoreUpdate, State } from "./types";

export const enqueueScoreUpdate = (
    state: State,
    update: ScoreUpdate,
): State => ({
    ...state,
    scoreEvents: [...state.scoreEvents, update],
});

/**
 * Consume every pending update. `scoreChanged` reports whether at least
 * one was consumed during this drain.
 */
export const drainScoreEvents = (state: State): State => ({
    ...state,
    score: state.scoreEvents.reduce(
        (_, update) => update.newScore,
        state.score,
    ),
    scoreEvents: [],
    scoreChanged: state.scoreEvents.length > 0,
});
