// src/tools/structures.ts
// Procedural structures built from static mesh cubes. The block layouts are
// pure functions; the tools spawn each block in order and report what landed.

import { z } from 'zod';

import type { CommandResponse, CommandSender, JsonObject } from '../connection/types.js';
import { createLogger } from '../logger.js';
import { spawnActor } from './actors.js';
import { DEFAULT_CUBE_MESH, Vector3 } from './shared.js';

const log = createLogger('Structures');

/** Basic shape cubes are 100 units on a side at scale 1 */
const CUBE_UNITS = 100;

export interface BlockSpec {
  name: string;
  location: Vector3;
  scale: Vector3;
}

export interface SpawnFailure {
  name: string;
  error: string;
}

export interface StructureResult {
  success: boolean;
  actors: JsonObject[];
  failures: SpawnFailure[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const CreatePyramidArgs = z.object({
  base_size: z.number().int().min(1).default(3),
  block_size: z.number().positive().default(100),
  location: Vector3.default([0, 0, 0]),
  name_prefix: z.string().min(1).default('PyramidBlock'),
  mesh: z.string().default(DEFAULT_CUBE_MESH),
});
export type CreatePyramidArgs = z.infer<typeof CreatePyramidArgs>;

export const CreateWallArgs = z.object({
  length: z.number().int().min(1).default(5),
  height: z.number().int().min(1).default(2),
  block_size: z.number().positive().default(100),
  location: Vector3.default([0, 0, 0]),
  orientation: z.enum(['x', 'y']).default('x'),
  name_prefix: z.string().min(1).default('WallBlock'),
  mesh: z.string().default(DEFAULT_CUBE_MESH),
});
export type CreateWallArgs = z.infer<typeof CreateWallArgs>;

export const CreateStaircaseArgs = z.object({
  steps: z.number().int().min(1).default(5),
  step_size: Vector3.default([100, 100, 50]),
  location: Vector3.default([0, 0, 0]),
  name_prefix: z.string().min(1).default('Stair'),
  mesh: z.string().default(DEFAULT_CUBE_MESH),
});
export type CreateStaircaseArgs = z.infer<typeof CreateStaircaseArgs>;

export const CreateArchArgs = z.object({
  radius: z.number().positive().default(300),
  segments: z.number().int().min(1).default(6),
  location: Vector3.default([0, 0, 0]),
  name_prefix: z.string().min(1).default('ArchBlock'),
  mesh: z.string().default(DEFAULT_CUBE_MESH),
});
export type CreateArchArgs = z.infer<typeof CreateArchArgs>;

// ─────────────────────────────────────────────────────────────────────────────
// Layouts
// ─────────────────────────────────────────────────────────────────────────────

function uniform(size: number): Vector3 {
  const s = size / CUBE_UNITS;
  return [s, s, s];
}

/**
 * Square layers shrinking by one block per level, each centered on `location`.
 */
export function pyramidBlocks(args: CreatePyramidArgs): BlockSpec[] {
  const [ox, oy, oz] = args.location;
  const blocks: BlockSpec[] = [];
  for (let level = 0; level < args.base_size; level++) {
    const count = args.base_size - level;
    const half = (count - 1) / 2;
    for (let x = 0; x < count; x++) {
      for (let y = 0; y < count; y++) {
        blocks.push({
          name: `${args.name_prefix}_${level}_${x}_${y}`,
          location: [ox + (x - half) * args.block_size, oy + (y - half) * args.block_size, oz + level * args.block_size],
          scale: uniform(args.block_size),
        });
      }
    }
  }
  return blocks;
}

export function wallBlocks(args: CreateWallArgs): BlockSpec[] {
  const [ox, oy, oz] = args.location;
  const blocks: BlockSpec[] = [];
  for (let h = 0; h < args.height; h++) {
    for (let i = 0; i < args.length; i++) {
      const along = i * args.block_size;
      blocks.push({
        name: `${args.name_prefix}_${h}_${i}`,
        location: args.orientation === 'x'
          ? [ox + along, oy, oz + h * args.block_size]
          : [ox, oy + along, oz + h * args.block_size],
        scale: uniform(args.block_size),
      });
    }
  }
  return blocks;
}

export function staircaseBlocks(args: CreateStaircaseArgs): BlockSpec[] {
  const [ox, oy, oz] = args.location;
  const [sx, sy, sz] = args.step_size;
  const blocks: BlockSpec[] = [];
  for (let i = 0; i < args.steps; i++) {
    blocks.push({
      name: `${args.name_prefix}_${i}`,
      location: [ox + i * sx, oy, oz + i * sz],
      scale: [sx / CUBE_UNITS, sy / CUBE_UNITS, sz / CUBE_UNITS],
    });
  }
  return blocks;
}

/**
 * A semicircle in the XZ plane: `segments + 1` blocks from angle 0 to pi.
 */
export function archBlocks(args: CreateArchArgs): BlockSpec[] {
  const [ox, oy, oz] = args.location;
  const step = Math.PI / args.segments;
  const s = args.radius / 300 / 2;
  const blocks: BlockSpec[] = [];
  for (let i = 0; i <= args.segments; i++) {
    const theta = step * i;
    blocks.push({
      name: `${args.name_prefix}_${i}`,
      location: [ox + args.radius * Math.cos(theta), oy, oz + args.radius * Math.sin(theta)],
      scale: [s, s, s],
    });
  }
  return blocks;
}

// ─────────────────────────────────────────────────────────────────────────────
// Tools
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Spawn blocks one at a time. A failed block is recorded and the rest still
 * go out; the structure succeeds when at least one block spawned.
 */
export async function spawnBlocks(bridge: CommandSender, blocks: BlockSpec[], mesh: string): Promise<StructureResult> {
  const actors: JsonObject[] = [];
  const failures: SpawnFailure[] = [];

  for (const block of blocks) {
    const response: CommandResponse = await spawnActor(bridge, {
      name: block.name,
      type: 'StaticMeshActor',
      location: block.location,
      rotation: [0, 0, 0],
      scale: block.scale,
      static_mesh: mesh,
    });
    if (response.status === 'success') {
      actors.push(response);
    } else {
      failures.push({ name: block.name, error: response.error });
    }
  }

  if (failures.length > 0) {
    log.warn(`${failures.length} of ${blocks.length} blocks failed to spawn`);
  }
  return { success: actors.length > 0, actors, failures };
}

export function createPyramid(bridge: CommandSender, args: CreatePyramidArgs): Promise<StructureResult> {
  return spawnBlocks(bridge, pyramidBlocks(args), args.mesh);
}

export function createWall(bridge: CommandSender, args: CreateWallArgs): Promise<StructureResult> {
  return spawnBlocks(bridge, wallBlocks(args), args.mesh);
}

export function createStaircase(bridge: CommandSender, args: CreateStaircaseArgs): Promise<StructureResult> {
  return spawnBlocks(bridge, staircaseBlocks(args), args.mesh);
}

export function createArch(bridge: CommandSender, args: CreateArchArgs): Promise<StructureResult> {
  return spawnBlocks(bridge, archBlocks(args), args.mesh);
}
