/**
 * Application entry point - runs the simulation in a terminal
 *
 * All I/O lives here: stdin keypresses become the key stream, a timer
 * becomes the frame clock, and the view writes to stdout. The core never
 * sees any of it. Log lines go to stderr, apart from the screen; each redraw
 * clears the terminal, so redirect stderr (`2>gate-runner.log`) to keep them.
 */

import { Console } from "node:console";
import { resolve } from "node:path";
import { emitKeypressEvents } from "node:readline";
import { fileURLToPath } from "node:url";
import {
    type Observable,
    catchError,
    filter,
    fromEvent,
    interval,
    map,
    pairwise,
    startWith,
    tap,
} from "rxjs";
import { Constants } from "./config";
import {
    type FrameTime,
    mode$,
    scoreChanged$,
    state$,
} from "./observable";
import type { Key } from "./types";
import { clamp } from "./util";
import { render } from "./view";

// Meant to be redirected; on the game's own terminal the next frame wipes it
const log = new Console(process.stderr);

/** Shape of the key argument readline passes to "keypress" listeners */
type KeypressKey = Readonly<{ name?: string; ctrl?: boolean }>;

const keyNames: ReadonlyMap<string, Key> = new Map<string, Key>([
    ["space", "Space"],
    ["p", "KeyP"],
    ["r", "KeyR"],
]);

/** Translate a readline key name into a logical key, if it is one */
export const toKey = (name: string | undefined): Key | undefined =>
    name === undefined ? undefined : keyNames.get(name);

/**
 * Frame clock from a fixed-rate timer. Deltas are measured, not assumed,
 * so a late timer still advances the simulation by the real time passed,
 * up to `MAX_FRAME_SECONDS`. Past the cap the game runs slower than real
 * time instead of letting an obstacle jump over the player's scoring
 * contact in one frame.
 */
const frameClock = (startMs: number): Observable<FrameTime> =>
    interval(Constants.TICK_RATE_MS).pipe(
        map(() => performance.now()),
        startWith(startMs),
        pairwise(),
        map(([previousMs, nowMs]) => ({
            deltaSeconds: clamp(
                (nowMs - previousMs) / 1000,
                0,
                Constants.MAX_FRAME_SECONDS,
            ),
            elapsedSeconds: (nowMs - startMs) / 1000,
        })),
    );

const isEntryPoint =
    process.argv[1] !== undefined &&
    fileURLToPath(import.meta.url) === resolve(process.argv[1]);

if (isEntryPoint && process.stdin.isTTY) {
    emitKeypressEvents(process.stdin);
    process.stdin.setRawMode(true);

    const keypress$ = fromEvent(
        process.stdin,
        "keypress",
        (_text: string | undefined, key: KeypressKey | undefined) => key,
    );

    keypress$
        .pipe(filter(key => key?.ctrl === true && key.name === "c"))
        .subscribe(() => process.exit(0));

    const keys$ = keypress$.pipe(
        map(key => toKey(key?.name)),
        filter((key): key is Key => key !== undefined),
    );

    const game$ = state$(keys$, frameClock(performance.now())).pipe(
        catchError(err => {
            log.error("Simulation stream failed:", err);
            throw err;
        }),
    );

    mode$(game$).subscribe(mode => log.info(`mode: ${mode}`));
    scoreChanged$(game$).subscribe(score => log.info(`score: ${score}`));
    game$.pipe(tap(render())).subscribe({
        error: () => process.exit(1),
    });
} else if (isEntryPoint) {
    log.error("gate-runner needs an interactive terminal");
    process.exitCode = 1;
}
