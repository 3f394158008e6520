/**
 * Reactive wiring: input and clock streams in, state stream out.
 *
 * Architecture: unidirectional data flow
 * Input Events → Actions → scan(reduceState) → observers
 *
 * The streams here are host-agnostic. The caller supplies the key stream and
 * the frame clock, which keeps this module free of any I/O and lets tests
 * drive it with plain Subjects.
 */

import {
    type Observable,
    distinctUntilChanged,
    filter,
    map,
    merge,
    scan,
    shareReplay,
    startWith,
} from "rxjs";
import {
    Jump,
    Pause,
    Restart,
    Tick,
    createInitialState,
    reduceState,
} from "./state";
import type { Action, GameMode, Key, State } from "./types";

/** One frame of the host clock */
export type FrameTime = Readonly<{
    deltaSeconds: number;
    elapsedSeconds: number;
}>;

/** Logical signal each key maps to */
export const keyToAction = (key: Key): Action => {
    switch (key) {
        case "Space":
            return new Jump();
        case "KeyP":
            return new Pause();
        case "KeyR":
            return new Restart();
    }
};

/**
 * Main state observable factory
 *
 * Keys become actions the moment they arrive, so a press lands before the
 * next tick. scan() serializes every action, which is the only ordering the
 * simulation needs. shareReplay() lets the derived streams below share a
 * single accumulation instead of each running their own.
 */
export const state$ = (
    keys$: Observable<Key>,
    frames$: Observable<FrameTime>,
    initial: State = createInitialState(),
): Observable<State> => {
    const tick$ = frames$.pipe(
        map(
            ({ deltaSeconds, elapsedSeconds }) =>
                new Tick(deltaSeconds, elapsedSeconds),
        ),
    );
    const input$ = keys$.pipe(map(keyToAction));

    return merge(input$, tick$).pipe(
        scan(reduceState, initial),
        startWith(initial),
        shareReplay({ bufferSize: 1, refCount: true }),
    );
};

/**
 * Score after every tick that consumed at least one score update. Input
 * actions re-emit the tick's state with its flag still set, so emissions are
 * keyed on the frame counter.
 */
export const scoreChanged$ = (states$: Observable<State>): Observable<number> =>
    states$.pipe(
        filter(s => s.scoreChanged),
        distinctUntilChanged((prev, curr) => prev.frame === curr.frame),
        map(s => s.score),
    );

/** Emits the mode whenever it changes, starting with the current one */
export const mode$ = (states$: Observable<State>): Observable<GameMode> =>
    states$.pipe(
        map(s => s.mode),
        distinctUntilChanged(),
    );
