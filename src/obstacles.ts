/**
 * Obstacle spawning, motion and pruning.
 *
 * A group is two hazards with a fixed-size gap between them and a thin score
 * gate filling the gap. The hazards reach past the play-field edges, so only
 * the gap has a fixed size.
 */

import { Constants, PlayerSpec, Viewport } from "./config";
import type {
    Entity,
    EntityId,
    HazardPart,
    ObstacleGroup,
    ScoreGate,
    State,
} from "./types";
import { randomBetween } from "./util";
import { despawnGroups } from "./world";

export type SpawnBounds = Readonly<{ lower: number; upper: number }>;

/**
 * Range for the gap centre. The upper bound keeps a minimum-height hazard
 * above the gap; the lower bound mirrors it and adds ground clearance.
 *
 * @param halfHeight - half the play-field height (H)
 * @param gapSize - fixed gap size (S)
 * @param minHeight - minimum hazard height (M)
 * @param groundHeight - ground strip height (G)
 */
export const spawnBounds = (
    halfHeight: number,
    gapSize: number,
    minHeight: number,
    groundHeight: number,
): SpawnBounds => {
    const upper = halfHeight - gapSize / 2 - minHeight;
    return { lower: -upper + groundHeight, upper };
};

export const defaultSpawnBounds = (): SpawnBounds =>
    spawnBounds(
        Viewport.HEIGHT / 2,
        Constants.GAP_SIZE,
        Constants.MIN_OBSTACLE_HEIGHT,
        Constants.GROUND_HEIGHT,
    );

type MemberLayout =
    | Omit<HazardPart, "id" | "groupId">
    | Omit<ScoreGate, "id" | "groupId">;

/**
 * Member geometry for a gap centred at `centerY`, relative to the group.
 * Upper hazard first, then lower hazard, then the gate.
 */
export const groupLayout = (centerY: number): ReadonlyArray<MemberLayout> => {
    const halfHeight = Viewport.HEIGHT / 2;
    const halfGap = Constants.GAP_SIZE / 2;

    const upperHeight = halfHeight - halfGap - centerY + PlayerSpec.HEIGHT;
    const lowerHeight = halfHeight + halfGap + centerY;

    return [
        {
            kind: "hazard",
            offsetY: upperHeight / 2 + halfGap,
            size: { x: Constants.OBSTACLE_WIDTH, y: upperHeight },
        },
        {
            kind: "hazard",
            offsetY: -lowerHeight / 2 - halfGap,
            size: { x: Constants.OBSTACLE_WIDTH, y: lowerHeight },
        },
        {
            kind: "scoreGate",
            offsetY: 0,
            size: { x: Constants.SCORE_GATE_WIDTH, y: Constants.GAP_SIZE },
        },
    ];
};

/** Append one group at `x` with its gap centred at `centerY` */
export const addObstacleGroup = (
    state: State,
    x: number,
    centerY: number,
): State => {
    const groupId = state.nextGroupId;
    const members = groupLayout(centerY).map((layout, index): Entity => ({
        ...layout,
        id: state.nextEntityId + index,
        groupId,
    }));
    const group: ObstacleGroup = {
        id: groupId,
        x,
        centerY,
        members: members.map((member): EntityId => member.id),
    };
    return {
        ...state,
        entities: [...state.entities, ...members],
        groups: [...state.groups, group],
        nextEntityId: state.nextEntityId + members.length,
        nextGroupId: groupId + 1,
    };
};

/**
 * Advance the repeating spawn timer by `dt` and spawn at most one group at
 * the right edge when it elapses. Inverted bounds skip the spawn but still
 * restart the timer.
 */
export const runSpawner =
    (bounds: SpawnBounds = defaultSpawnBounds()) =>
    (state: State, dt: number): State => {
        const elapsedOnTimer = state.spawnTimer + dt;
        if (elapsedOnTimer < Constants.SPAWN_INTERVAL_SECONDS)
            return { ...state, spawnTimer: elapsedOnTimer };

        const rearmed = {
            ...state,
            spawnTimer: elapsedOnTimer % Constants.SPAWN_INTERVAL_SECONDS,
        };
        if (bounds.lower > bounds.upper) return rearmed;

        const draw = randomBetween(state.rngSeed, bounds.lower, bounds.upper);
        return addObstacleGroup(
            { ...rearmed, rngSeed: draw.seed },
            Viewport.WIDTH / 2 + Constants.OBSTACLE_WIDTH,
            draw.value,
        );
    };

/** Translate every group left by `speed · dt` */
export const moveObstacles =
    (speed: number = Constants.OBSTACLE_SPEED) =>
    (state: State, dt: number): State => ({
        ...state,
        groups: state.groups.map(group => ({
            ...group,
            x: group.x - speed * dt,
        })),
    });

/**
 * Despawn groups whose right edge has left the play field. They are already
 * behind the player's fixed x, so no collision outcome changes.
 */
export const pruneObstacles = (state: State): State =>
    despawnGroups(
        state,
        state.groups
            .filter(
                group =>
                    group.x + Constants.OBSTACLE_WIDTH / 2 < -Viewport.WIDTH / 2,
            )
            .map(group => group.id),
    );
