/**
 * Type definitions for the gate runner simulation.
 *
 * Everything is `Readonly`: every system returns a new State instead of
 * mutating the one it was given, so a tick is a plain State -> State function.
 */

// Union type for keyboard input
export type Key = "Space" | "KeyP" | "KeyR";

// 2D vector with readonly properties
export type Vec2 = Readonly<{ x: number; y: number }>;

/** Axis-aligned box given by its centre and full size */
export type Box = Readonly<{ center: Vec2; size: Vec2 }>;

export type EntityId = number;

/**
 * Finite set of game modes. `mainMenu` is reserved: nothing transitions
 * into it.
 */
export type GameMode = "idle" | "playing" | "gameOver" | "paused" | "mainMenu";

/**
 * The single controllable entity
 * - pos: centre of the box, only y changes during play
 * - vel: vertical velocity in units per second
 */
export type Player = Readonly<{
    kind: "player";
    id: EntityId;
    pos: Vec2;
    vel: number;
    size: Vec2;
}>;

export type Ground = Readonly<{
    kind: "ground";
    id: EntityId;
    pos: Vec2;
    size: Vec2;
}>;

/**
 * Members of an obstacle group carry no horizontal position of their own:
 * they sit at the group's x and at `centerY + offsetY` vertically.
 */
export type HazardPart = Readonly<{
    kind: "hazard";
    id: EntityId;
    groupId: number;
    offsetY: number;
    size: Vec2;
}>;

export type ScoreGate = Readonly<{
    kind: "scoreGate";
    id: EntityId;
    groupId: number;
    offsetY: number;
    size: Vec2;
}>;

export type Entity = Player | Ground | HazardPart | ScoreGate;

export type ObstacleGroup = Readonly<{
    id: number;
    x: number;
    centerY: number;
    members: ReadonlyArray<EntityId>;
}>;

export type ColliderClass = "hazard" | "scoreGate";

export type Collider = Readonly<{
    entityId: EntityId;
    classification: ColliderClass;
    box: Box;
}>;

/** Face of the collider the player box straddles */
export type CollisionSide = "left" | "right" | "top" | "bottom" | "inside";

export type CollisionEvent = Readonly<{
    entityId: EntityId;
    classification: ColliderClass;
    side: CollisionSide;
}>;

/** Carries the new score value, not a delta, so resets share the path */
export type ScoreUpdate = Readonly<{ newScore: number }>;

/** What the host hands the core once per frame */
export type FrameInput = Readonly<{
    deltaSeconds: number;
    elapsedSeconds: number;
    jumpPressed: boolean;
    restartPressed: boolean;
    pausePressed: boolean;
}>;

/** Read-only view handed to presentation */
export type RenderBox = Readonly<{
    id: EntityId;
    kind: Entity["kind"];
    center: Vec2;
    size: Vec2;
}>;

export type Snapshot = Readonly<{
    mode: GameMode;
    score: number;
    boxes: ReadonlyArray<RenderBox>;
}>;

/**
 * Action interface for state transformations
 * - Each input or clock tick becomes an Action
 * - apply() transforms current state to next state immutably
 */
export interface Action {
    apply(s: State): State;
}

/**
 * Complete simulation state - the single source of truth
 *
 * State Categories:
 * - World: entities (indexed arena), groups, id counters
 * - Game flow: mode, score
 * - Event queues: scoreEvents (pending), collisions (last tick's log),
 *   scoreChanged (notification for the last tick)
 * - Timing: frame (ticks applied so far), elapsed, spawnTimer
 * - Randomness: rngSeed (threaded through the spawner)
 */
export type State = Readonly<{
    mode: GameMode;
    entities: ReadonlyArray<Entity>;
    groups: ReadonlyArray<ObstacleGroup>;
    nextEntityId: number;
    nextGroupId: number;
    score: number;
    scoreEvents: ReadonlyArray<ScoreUpdate>;
    collisions: ReadonlyArray<CollisionEvent>;
    scoreChanged: boolean;
    frame: number;
    elapsed: number;
    spawnTimer: number;
    rngSeed: number;
}>;
