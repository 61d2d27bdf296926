// src/tools/actors.ts
// Level actor tools

import { z } from 'zod';

import type { CommandResponse, CommandSender, JsonObject } from '../connection/types.js';
import { DEFAULT_CUBE_MESH, Vector3 } from './shared.js';

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const FindActorsByNameArgs = z.object({
  pattern: z.string().min(1),
});
export type FindActorsByNameArgs = z.infer<typeof FindActorsByNameArgs>;

export const SpawnActorArgs = z.object({
  name: z.string().min(1),
  type: z.string().default('StaticMeshActor'),
  location: Vector3.default([0, 0, 0]),
  rotation: Vector3.default([0, 0, 0]),
  scale: Vector3.default([1, 1, 1]),
  static_mesh: z.string().optional(),
});
export type SpawnActorArgs = z.infer<typeof SpawnActorArgs>;

export const DeleteActorArgs = z.object({
  name: z.string().min(1),
});
export type DeleteActorArgs = z.infer<typeof DeleteActorArgs>;

export const SetActorTransformArgs = z.object({
  name: z.string().min(1),
  location: Vector3.optional(),
  rotation: Vector3.optional(),
  scale: Vector3.optional(),
});
export type SetActorTransformArgs = z.infer<typeof SetActorTransformArgs>;

// ─────────────────────────────────────────────────────────────────────────────
// Tools
// ─────────────────────────────────────────────────────────────────────────────

export function getActorsInLevel(bridge: CommandSender): Promise<CommandResponse> {
  return bridge.sendCommand('get_actors_in_level', {});
}

export function findActorsByName(bridge: CommandSender, args: FindActorsByNameArgs): Promise<CommandResponse> {
  return bridge.sendCommand('find_actors_by_name', { pattern: args.pattern });
}

export function spawnActor(bridge: CommandSender, args: SpawnActorArgs): Promise<CommandResponse> {
  const params: JsonObject = {
    name: args.name,
    type: args.type,
    location: args.location,
    rotation: args.rotation,
    scale: args.scale,
  };
  if (args.type === 'StaticMeshActor') {
    params.static_mesh = args.static_mesh ?? DEFAULT_CUBE_MESH;
  } else if (args.static_mesh) {
    params.static_mesh = args.static_mesh;
  }
  return bridge.sendCommand('spawn_actor', params);
}

export function deleteActor(bridge: CommandSender, args: DeleteActorArgs): Promise<CommandResponse> {
  return bridge.sendCommand('delete_actor', { name: args.name });
}

/**
 * Only the parts of the transform that were given are sent.
 */
export function setActorTransform(bridge: CommandSender, args: SetActorTransformArgs): Promise<CommandResponse> {
  const params: JsonObject = { name: args.name };
  if (args.location) params.location = args.location;
  if (args.rotation) params.rotation = args.rotation;
  if (args.scale) params.scale = args.scale;
  return bridge.sendCommand('set_actor_transform', params);
}
