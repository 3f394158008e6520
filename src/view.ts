/**
 * Terminal presentation for the Node host.
 *
 * Reads only the snapshot of the state, never the state itself, and draws a
 * coarse character grid of the play field followed by a status line.
 */

import { Viewport } from "./config";
import type { RenderBox, Snapshot, State } from "./types";
import { snapshot } from "./world";

export const Screen = {
    COLUMNS: 96,
    ROWS: 27,
} as const;

const glyphs: Readonly<Record<RenderBox["kind"], string>> = {
    ground: "=",
    hazard: "#",
    scoreGate: ":",
    player: "@",
};

// Later kinds are drawn over earlier ones
const drawOrder: ReadonlyArray<RenderBox["kind"]> = [
    "ground",
    "hazard",
    "scoreGate",
    "player",
];

const statusLine = (view: Snapshot): string => {
    switch (view.mode) {
        case "idle":
            return `Score ${view.score}  SPACE to start`;
        case "playing":
            return `Score ${view.score}  SPACE jump  P pause`;
        case "paused":
            return `Score ${view.score}  paused, P to resume`;
        case "gameOver":
            return `Score ${view.score}  GAME OVER, R to restart`;
        case "mainMenu":
            return `Score ${view.score}`;
    }
};

const toColumn = (x: number): number =>
    Math.floor(((x + Viewport.WIDTH / 2) / Viewport.WIDTH) * Screen.COLUMNS);

const toRow = (y: number): number =>
    Math.floor(((Viewport.HEIGHT / 2 - y) / Viewport.HEIGHT) * Screen.ROWS);

/**
 * Rasterize a snapshot into text lines, one per screen row, plus the
 * status line. Boxes are clipped to the screen.
 */
export const drawFrame = (view: Snapshot): ReadonlyArray<string> => {
    const grid = Array.from({ length: Screen.ROWS }, () =>
        Array.from({ length: Screen.COLUMNS }, () => " "),
    );

    drawOrder.forEach(kind =>
        view.boxes
            .filter(box => box.kind === kind)
            .forEach(box => {
                const left = toColumn(box.center.x - box.size.x / 2);
                const right = toColumn(box.center.x + box.size.x / 2);
                const top = toRow(box.center.y + box.size.y / 2);
                const bottom = toRow(box.center.y - box.size.y / 2);
                const lastRow = Math.min(bottom, Screen.ROWS - 1);
                const lastColumn = Math.min(right, Screen.COLUMNS - 1);
                for (let row = Math.max(top, 0); row <= lastRow; row++)
                    for (let col = Math.max(left, 0); col <= lastColumn; col++)
                        grid[row][col] = glyphs[kind];
            }),
    );

    return [...grid.map(cells => cells.join("")), statusLine(view)];
};

/**
 * Returns the per-frame drawing function. The last frame written is kept so
 * an unchanged frame costs no output.
 */
export const render = (
    write: (text: string) => void = text => {
        process.stdout.write(text);
    },
): ((s: State) => void) => {
    const cache: { lastFrame: string | null } = { lastFrame: null };

    return (currentState: State) => {
        const frame = drawFrame(snapshot(currentState)).join("\n");
        if (frame === cache.lastFrame) return;
        cache.lastFrame = frame;
        // Move the cursor home and clear below before redrawing
        write(`\x1b[H\x1b[J${frame}\n`);
    };
};
