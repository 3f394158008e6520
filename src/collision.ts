/**
 * Collision detection between the player and every live collider.
 *
 * Detection only reports: it returns the collision log, the score updates
 * earned and the gates to despawn. Applying those is left to the tick so the
 * ordering between systems stays in one place.
 */

import type {
    Box,
    Collider,
    CollisionEvent,
    CollisionSide,
    EntityId,
    ScoreUpdate,
    Player,
    State,
} from "./types";
import { colliders, findPlayer, playerBox } from "./world";

type AxisHit = Readonly<{ side: CollisionSide; depth: number }>;

/**
 * Which face of the collider span [bMin, bMax] the mover span [aMin, aMax]
 * straddles on one axis. A mover that spans the collider, or sits inside
 * it, reports `inside` with infinite depth so the other axis decides.
 */
const axisHit = (
    aMin: number,
    aMax: number,
    bMin: number,
    bMax: number,
    lowSide: CollisionSide,
    highSide: CollisionSide,
): AxisHit => {
    if (aMin < bMin && aMax > bMin && aMax < bMax)
        return { side: lowSide, depth: bMin - aMax };
    if (aMin > bMin && aMin < bMax && aMax > bMax)
        return { side: highSide, depth: aMin - bMax };
    return { side: "inside", depth: -Infinity };
};

/**
 * Axis-aligned overlap test between mover `a` and collider `b`.
 *
 * @returns the collider side that was hit, or undefined when the boxes do
 * not overlap. Touching edges do not count. The axis with the shallower
 * penetration wins; on a tie the horizontal side is reported.
 */
export const collide = (a: Box, b: Box): CollisionSide | undefined => {
    const aMinX = a.center.x - a.size.x / 2;
    const aMaxX = a.center.x + a.size.x / 2;
    const aMinY = a.center.y - a.size.y / 2;
    const aMaxY = a.center.y + a.size.y / 2;
    const bMinX = b.center.x - b.size.x / 2;
    const bMaxX = b.center.x + b.size.x / 2;
    const bMinY = b.center.y - b.size.y / 2;
    const bMaxY = b.center.y + b.size.y / 2;

    const overlaps =
        aMinX < bMaxX && aMaxX > bMinX && aMinY < bMaxY && aMaxY > bMinY;
    if (!overlaps) return undefined;

    const horizontal = axisHit(aMinX, aMaxX, bMinX, bMaxX, "left", "right");
    const vertical = axisHit(aMinY, aMaxY, bMinY, bMaxY, "bottom", "top");

    return Math.abs(vertical.depth) < Math.abs(horizontal.depth)
        ? vertical.side
        : horizontal.side;
};

/** A gate counts only once the player straddles its trailing (right) face */
export const isScoringContact = (
    collider: Collider,
    side: CollisionSide,
): boolean => collider.classification === "scoreGate" && side === "right";

export type CollisionReport = Readonly<{
    collisions: ReadonlyArray<CollisionEvent>;
    scoreEvents: ReadonlyArray<ScoreUpdate>;
    consumedGates: ReadonlyArray<EntityId>;
    hazardHit: boolean;
}>;

const emptyReport: CollisionReport = {
    collisions: [],
    scoreEvents: [],
    consumedGates: [],
    hazardHit: false,
};

/**
 * True once the player's bottom edge is below the top of any ground. A
 * single large step can carry the player clear through the ground without
 * an overlap ever being seen.
 */
export const isBelowGround = (state: State, player: Player): boolean =>
    state.entities.some(
        entity =>
            entity.kind === "ground" &&
            player.pos.y - player.size.y / 2 <
                entity.pos.y + entity.size.y / 2,
    );

/**
 * Test the player against every collider in `state`. All overlaps are
 * processed: a hazard and a scoring gate in the same tick both show up.
 * Each score update carries the score as read at the start of the pass plus
 * one. Being below the ground counts as a hazard hit even with no overlap.
 */
export const detectCollisions = (state: State): CollisionReport => {
    const player = findPlayer(state);
    if (player === undefined) return emptyReport;
    const mover = playerBox(player);

    const hits = colliders(state).flatMap(collider => {
        const side = collide(mover, collider.box);
        return side === undefined ? [] : [{ collider, side }];
    });

    const scoring = hits.filter(({ collider, side }) =>
        isScoringContact(collider, side),
    );

    return {
        collisions: hits.map(({ collider, side }) => ({
            entityId: collider.entityId,
            classification: collider.classification,
            side,
        })),
        scoreEvents: scoring.map(() => ({ newScore: state.score + 1 })),
        consumedGates: scoring.map(({ collider }) => collider.entityId),
        hazardHit:
            hits.some(({ collider }) => collider.classification === "hazard") ||
            isBelowGround(state, player),
    };
};
