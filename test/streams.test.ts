import { Subject } from "rxjs";
import { assert, describe, expect, it } from "vitest";
import { toKey } from "../src/main";
import {
    type FrameTime,
    keyToAction,
    mode$,
    scoreChanged$,
    state$,
} from "../src/observable";
import { addObstacleGroup } from "../src/obstacles";
import { Jump, Pause, Restart, createInitialState } from "../src/state";
import type { GameMode, Key, State } from "../src/types";
import { Screen, drawFrame, render } from "../src/view";
import { snapshot } from "../src/world";

const harness = (initial: State = createInitialState()) => {
    const keys = new Subject<Key>();
    const frames = new Subject<FrameTime>();
    return { keys, frames, states: state$(keys, frames, initial) };
};

describe("State Stream", () => {
    it("should emit the initial state and fold actions in arrival order", () => {
        const { keys, frames, states } = harness();
        const seen: State[] = [];
        states.subscribe(s => seen.push(s));

        expect(seen).toHaveLength(1);
        expect(seen[0].mode).toBe("idle");

        keys.next("Space");
        frames.next({ deltaSeconds: 0, elapsedSeconds: 0 });

        expect(seen).toHaveLength(3);
        expect(seen[1].mode).toBe("playing");
        expect(seen[2].frame).toBe(1);
    });

    it("should notify score changes once per tick", () => {
        const { keys, frames, states } = harness({
            ...addObstacleGroup(createInitialState(), -524, 0),
            mode: "playing",
        });
        const scores: number[] = [];
        const modes: GameMode[] = [];
        mode$(states).subscribe(m => modes.push(m));
        scoreChanged$(states).subscribe(score => scores.push(score));

        frames.next({ deltaSeconds: 0, elapsedSeconds: 0 });
        keys.next("KeyP");
        frames.next({ deltaSeconds: 0, elapsedSeconds: 0 });

        expect(scores).toEqual([1]);
        expect(modes).toEqual(["playing", "paused"]);
    });

    it("should map keys to their actions", () => {
        expect(keyToAction("Space")).toBeInstanceOf(Jump);
        expect(keyToAction("KeyP")).toBeInstanceOf(Pause);
        expect(keyToAction("KeyR")).toBeInstanceOf(Restart);
    });
});

describe("Terminal Host", () => {
    it("should translate readline key names", () => {
        expect(toKey("space")).toBe("Space");
        expect(toKey("r")).toBe("KeyR");
        expect(toKey("p")).toBe("KeyP");
        expect(toKey("x")).toBeUndefined();
        expect(toKey(undefined)).toBeUndefined();
    });

    it("should rasterize the player, the ground and the status line", () => {
        const lines = drawFrame(snapshot(createInitialState()));

        expect(lines).toHaveLength(Screen.ROWS + 1);
        expect(lines[13].slice(21, 25)).toBe("@@@@");
        expect(lines[13][20]).toBe(" ");
        expect(lines[26]).toBe("=".repeat(Screen.COLUMNS));
        expect(lines[Screen.ROWS]).toBe("Score 0  SPACE to start");
    });

    it("should skip writing unchanged frames", () => {
        const written: string[] = [];
        const draw = render(text => written.push(text));
        const state = createInitialState();

        draw(state);
        draw(state);

        expect(written).toHaveLength(1);
        assert.isTrue(written[0].startsWith("\x1b[H\x1b[J"));
    });
});
