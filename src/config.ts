/**
 * Fixed configuration, grouped with `as const` so it is readonly and
 * adjustable in one place. The origin is the centre of the play field and
 * y grows upwards.
 */

/** Play field dimensions */
export const Viewport = {
    WIDTH: 1920,
    HEIGHT: 1080,
} as const;

/** Player box and start position */
export const PlayerSpec = {
    WIDTH: 50,
    HEIGHT: 50,
    START_X: -500,
    START_Y: 0,
} as const;

export const Constants = {
    // Player physics (units per second)
    GRAVITY: -2500,
    JUMP_VELOCITY: 700,

    // Idle bob before a round starts
    IDLE_BOB_FREQUENCY: 0.5,
    IDLE_BOB_AMPLITUDE: 10,

    // Obstacles
    OBSTACLE_SPEED: 400,
    OBSTACLE_WIDTH: 100,
    SPAWN_INTERVAL_SECONDS: 1.1,
    GAP_SIZE: 225,
    MIN_OBSTACLE_HEIGHT: 100,
    SCORE_GATE_WIDTH: 10,

    GROUND_HEIGHT: 100,

    // Host timing. At the cap an obstacle moves 8 units per frame, less
    // than a score gate is wide.
    TICK_RATE_MS: 16,
    MAX_FRAME_SECONDS: 0.02,

    RNG_SEED: 123456789,
} as const;
