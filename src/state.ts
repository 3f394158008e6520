/**
 * Game State Management
 *
 * The state machine and the per-tick ordering of every system. Each input
 * and each clock tick is an Action whose apply() returns a fresh State, so
 * one tick is one pure function call and nothing leaks between ticks.
 *
 * Modes:
 * - idle: player bobs in place, a jump starts the round
 * - playing: physics, spawner, motion and collision run
 * - paused: frozen until pause is pressed again
 * - gameOver: frozen, only restart is accepted
 * - mainMenu: reserved, never entered
 */

import { Constants } from "./config";
import { detectCollisions } from "./collision";
import { moveObstacles, pruneObstacles, runSpawner } from "./obstacles";
import { bobPlayer, integratePlayer, jumpPlayer } from "./physics";
import { drainScoreEvents, enqueueScoreUpdate } from "./score";
import type { Action, FrameInput, State } from "./types";
import { sanitizeDelta } from "./util";
import {
    createGround,
    createPlayer,
    despawnAllGroups,
    despawnEntities,
    despawnPlayer,
    findPlayer,
    spawnEntity,
    updatePlayer,
} from "./world";

const emptyWorld: State = {
    mode: "idle",
    entities: [],
    groups: [],
    nextEntityId: 0,
    nextGroupId: 0,
    score: 0,
    scoreEvents: [],
    collisions: [],
    scoreChanged: false,
    frame: 0,
    elapsed: 0,
    spawnTimer: 0,
    rngSeed: Constants.RNG_SEED,
};

/** Ground is created once here and survives every restart */
export const createInitialState = (
    rngSeed: number = Constants.RNG_SEED,
): State =>
    spawnEntity(
        spawnEntity({ ...emptyWorld, rngSeed }, createGround),
        createPlayer,
    );

export const initialState: State = createInitialState();

const spawner = runSpawner();
const motion = moveObstacles();

/**
 * Everything that runs while playing, in order: physics, spawner, motion,
 * pruning, then collision detection on the settled positions. Gates that
 * scored are removed before the tick ends; a hazard hit ends the round.
 */
const simulate = (state: State, dt: number): State => {
    const fallen = updatePlayer(state, player => integratePlayer(player, dt));
    const settled = pruneObstacles(motion(spawner(fallen, dt), dt));

    const report = detectCollisions(settled);
    return {
        ...despawnEntities(settled, report.consumedGates),
        collisions: report.collisions,
        scoreEvents: [...settled.scoreEvents, ...report.scoreEvents],
        mode: report.hazardHit ? "gameOver" : settled.mode,
    };
};

/**
 * Tick Action - advances the simulation by one frame
 *
 * Which systems run depends on the mode. The score pipeline runs in every
 * mode, last, so updates queued by collisions or by a restart are consumed
 * within the tick that sees them.
 */
export class Tick implements Action {
    constructor(
        private readonly deltaSeconds: number,
        private readonly elapsedSeconds: number,
    ) {}

    apply(currentState: State): State {
        const dt = sanitizeDelta(this.deltaSeconds);
        const elapsed = Number.isFinite(this.elapsedSeconds)
            ? this.elapsedSeconds
            : currentState.elapsed;
        const timed: State = {
            ...currentState,
            frame: currentState.frame + 1,
            elapsed,
            collisions: [],
        };

        switch (timed.mode) {
            case "idle":
                return drainScoreEvents(
                    updatePlayer(timed, player => bobPlayer(player, elapsed)),
                );
            case "playing":
                return drainScoreEvents(simulate(timed, dt));
            default:
                return drainScoreEvents(timed);
        }
    }
}

/**
 * Jump Action - sets the jump velocity
 *
 * - idle: also starts the round
 * - playing: jump only
 * - anything else, or no player: ignored
 */
export class Jump implements Action {
    apply(currentState: State): State {
        if (findPlayer(currentState) === undefined) return currentState;

        switch (currentState.mode) {
            case "idle":
                return {
                    ...updatePlayer(currentState, jumpPlayer),
                    mode: "playing",
                };
            case "playing":
                return updatePlayer(currentState, jumpPlayer);
            default:
                return currentState;
        }
    }
}

/** Pause Action - toggles between playing and paused, ignored otherwise */
export class Pause implements Action {
    apply(currentState: State): State {
        switch (currentState.mode) {
            case "playing":
                return { ...currentState, mode: "paused" };
            case "paused":
                return { ...currentState, mode: "playing" };
            default:
                return currentState;
        }
    }
}

/**
 * Restart Action - leaves game over for a fresh idle round
 *
 * In one step: drop the player and every obstacle group, queue a score reset
 * to zero for the score pipeline, and spawn a new player at the start.
 * The ground, spawn timer and random seed carry over.
 */
export class Restart implements Action {
    apply(currentState: State): State {
        if (currentState.mode !== "gameOver") return currentState;

        const cleared = despawnAllGroups(despawnPlayer(currentState));
        const reset = enqueueScoreUpdate(cleared, { newScore: 0 });
        return { ...spawnEntity(reset, createPlayer), mode: "idle" };
    }
}

export const reduceState = (s: State, action: Action): State => action.apply(s);

/**
 * Host entry point for frame-driven loops: apply this frame's edge-triggered
 * inputs, then advance one tick.
 */
export const step = (state: State, frame: FrameInput): State => {
    const inputs: ReadonlyArray<Action> = [
        ...(frame.jumpPressed ? [new Jump()] : []),
        ...(frame.pausePressed ? [new Pause()] : []),
        ...(frame.restartPressed ? [new Restart()] : []),
    ];
    return [
        ...inputs,
        new Tick(frame.deltaSeconds, frame.elapsedSeconds),
    ].reduce(reduceState, state);
};
