/**
 * World / entity store.
 *
 * Entities live in a flat arena keyed by id. Obstacle members point at their
 * group by id and the group lists its members, so despawning a group is a
 * filter over both arrays.
 */

import { Constants, PlayerSpec, Viewport } from "./config";
import type {
    Box,
    Collider,
    Entity,
    EntityId,
    Ground,
    ObstacleGroup,
    Player,
    Snapshot,
    State,
    Vec2,
} from "./types";

export const createPlayer = (id: EntityId): Player => ({
    kind: "player",
    id,
    pos: { x: PlayerSpec.START_X, y: PlayerSpec.START_Y },
    vel: 0,
    size: { x: PlayerSpec.WIDTH, y: PlayerSpec.HEIGHT },
});

/** Ground strip along the bottom edge, spanning the full width */
export const createGround = (id: EntityId): Ground => ({
    kind: "ground",
    id,
    pos: { x: 0, y: -Viewport.HEIGHT / 2 + Constants.GROUND_HEIGHT / 2 },
    size: { x: Viewport.WIDTH, y: Constants.GROUND_HEIGHT },
});

/** Allocate an id and append the entity built from it */
export const spawnEntity = (
    state: State,
    build: (id: EntityId) => Entity,
): State => ({
    ...state,
    entities: [...state.entities, build(state.nextEntityId)],
    nextEntityId: state.nextEntityId + 1,
});

export const findPlayer = (state: State): Player | undefined =>
    state.entities.find(
        (entity): entity is Player => entity.kind === "player",
    );

/** Apply `update` to the player; no-op when there is none */
export const updatePlayer = (
    state: State,
    update: (player: Player) => Player,
): State =>
    findPlayer(state) === undefined
        ? state
        : {
              ...state,
              entities: state.entities.map(entity =>
                  entity.kind === "player" ? update(entity) : entity,
              ),
          };

export const despawnPlayer = (state: State): State => ({
    ...state,
    entities: state.entities.filter(entity => entity.kind !== "player"),
});

/** Remove single entities, also dropping them from their group's members */
export const despawnEntities = (
    state: State,
    ids: ReadonlyArray<EntityId>,
): State => {
    if (ids.length === 0) return state;
    const removed = new Set(ids);
    return {
        ...state,
        entities: state.entities.filter(entity => !removed.has(entity.id)),
        groups: state.groups.map(group => ({
            ...group,
            members: group.members.filter(member => !removed.has(member)),
        })),
    };
};

/** Remove groups together with every member */
export const despawnGroups = (
    state: State,
    groupIds: ReadonlyArray<number>,
): State => {
    if (groupIds.length === 0) return state;
    const removed = new Set(groupIds);
    return {
        ...state,
        entities: state.entities.filter(
            entity =>
                !(
                    (entity.kind === "hazard" || entity.kind === "scoreGate") &&
                    removed.has(entity.groupId)
                ),
        ),
        groups: state.groups.filter(group => !removed.has(group.id)),
    };
};

export const despawnAllGroups = (state: State): State =>
    despawnGroups(
        state,
        state.groups.map(group => group.id),
    );

const groupIndex = (
    groups: ReadonlyArray<ObstacleGroup>,
): ReadonlyMap<number, ObstacleGroup> =>
    new Map(
        groups.map((group): [number, ObstacleGroup] => [group.id, group]),
    );

/**
 * World-space centre of an entity. Group members are resolved through their
 * group; an orphaned member has no position.
 */
const positionOf = (
    entity: Entity,
    groups: ReadonlyMap<number, ObstacleGroup>,
): Vec2 | undefined => {
    switch (entity.kind) {
        case "player":
        case "ground":
            return entity.pos;
        case "hazard":
        case "scoreGate": {
            const group = groups.get(entity.groupId);
            return group === undefined
                ? undefined
                : { x: group.x, y: group.centerY + entity.offsetY };
        }
    }
};

export const playerBox = (player: Player): Box => ({
    center: player.pos,
    size: player.size,
});

/** Every live collider, boxes read from the entities' current positions */
export const colliders = (state: State): ReadonlyArray<Collider> => {
    const groups = groupIndex(state.groups);
    return state.entities.flatMap((entity): ReadonlyArray<Collider> => {
        if (entity.kind === "player") return [];
        const center = positionOf(entity, groups);
        if (center === undefined) return [];
        return [
            {
                entityId: entity.id,
                classification:
                    entity.kind === "scoreGate" ? "scoreGate" : "hazard",
                box: { center, size: entity.size },
            },
        ];
    });
};

/** Read-only snapshot for presentation */
export const snapshot = (state: State): Snapshot => {
    const groups = groupIndex(state.groups);
    return {
        mode: state.mode,
        score: state.score,
        boxes: state.entities.flatMap(entity => {
            const center = positionOf(entity, groups);
            return center === undefined
                ? []
                : [
                      {
                          id: entity.id,
                          kind: entity.kind,
                          center,
                          size: entity.size,
                      },
                  ];
        }),
    };
};
