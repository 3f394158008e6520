/**
 * Vertical motion of the player: gravity integration, the jump impulse and
 * the idle bob shown before a round starts.
 */

import { Constants, PlayerSpec, Viewport } from "./config";
import type { Player } from "./types";

/**
 * Constant-acceleration step over `dt` seconds.
 *
 *   y' = y + v·dt + ½·g·dt²
 *   v' = v + g·dt
 *
 * y' is capped just above the top of the play field. There is no lower cap:
 * falling through the ground is a collision, not a physics boundary.
 */
export const integratePlayer = (
    player: Player,
    dt: number,
    gravity: number = Constants.GRAVITY,
): Player => {
    const newPosY = player.pos.y + player.vel * dt + 0.5 * gravity * dt * dt;
    const ceiling = Viewport.HEIGHT / 2 + PlayerSpec.HEIGHT / 2;
    return {
        ...player,
        pos: { x: player.pos.x, y: Math.min(newPosY, ceiling) },
        vel: player.vel + gravity * dt,
    };
};

/** Overwrites the velocity; jumps never accumulate */
export const jumpPlayer = (player: Player): Player => ({
    ...player,
    vel: Constants.JUMP_VELOCITY,
});

/** Height of the idle bob at `elapsedSeconds` since process start */
export const idleBobOffset = (elapsedSeconds: number): number =>
    Constants.IDLE_BOB_AMPLITUDE *
    Math.sin(2 * Math.PI * Constants.IDLE_BOB_FREQUENCY * elapsedSeconds);

export const bobPlayer = (player: Player, elapsedSeconds: number): Player => ({
    ...player,
    pos: { x: player.pos.x, y: idleBobOffset(elapsedSeconds) },
});
