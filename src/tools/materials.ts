// src/tools/materials.ts
// Material lookup and assignment tools

import { z } from 'zod';

import type { CommandResponse, CommandSender, JsonObject } from '../connection/types.js';
import { ColorArg } from './shared.js';

export const DEFAULT_MATERIAL_PATH = '/Engine/BasicShapes/BasicShapeMaterial';

// The editor's basic material exposes either parameter depending on version
const COLOR_PARAMETERS = ['BaseColor', 'Color'] as const;

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const GetAvailableMaterialsArgs = z.object({
  search_path: z.string().default('/Game/'),
  include_engine_materials: z.boolean().default(true),
});
export type GetAvailableMaterialsArgs = z.infer<typeof GetAvailableMaterialsArgs>;

export const ApplyMaterialToActorArgs = z.object({
  actor_name: z.string().min(1),
  material_path: z.string().min(1),
  material_slot: z.number().int().min(0).default(0),
});
export type ApplyMaterialToActorArgs = z.infer<typeof ApplyMaterialToActorArgs>;

export const ApplyMaterialToBlueprintArgs = z.object({
  blueprint_name: z.string().min(1),
  component_name: z.string().min(1),
  material_path: z.string().min(1),
  material_slot: z.number().int().min(0).default(0),
});
export type ApplyMaterialToBlueprintArgs = z.infer<typeof ApplyMaterialToBlueprintArgs>;

export const GetActorMaterialInfoArgs = z.object({
  actor_name: z.string().min(1),
});
export type GetActorMaterialInfoArgs = z.infer<typeof GetActorMaterialInfoArgs>;

export const GetBlueprintMaterialInfoArgs = z.object({
  blueprint_name: z.string().min(1),
  component_name: z.string().min(1),
});
export type GetBlueprintMaterialInfoArgs = z.infer<typeof GetBlueprintMaterialInfoArgs>;

export const SetMeshMaterialColorArgs = z.object({
  blueprint_name: z.string().min(1),
  component_name: z.string().min(1),
  color: ColorArg,
  material_path: z.string().default(DEFAULT_MATERIAL_PATH),
  material_slot: z.number().int().min(0).default(0),
});
export type SetMeshMaterialColorArgs = z.infer<typeof SetMeshMaterialColorArgs>;

export interface MaterialColorResult {
  success: boolean;
  message: string;
  color: [number, number, number, number];
  material_slot: number;
  results: Record<(typeof COLOR_PARAMETERS)[number], CommandResponse>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Tools
// ─────────────────────────────────────────────────────────────────────────────

export function getAvailableMaterials(bridge: CommandSender, args: GetAvailableMaterialsArgs): Promise<CommandResponse> {
  return bridge.sendCommand('get_available_materials', {
    search_path: args.search_path,
    include_engine_materials: args.include_engine_materials,
  });
}

export function applyMaterialToActor(bridge: CommandSender, args: ApplyMaterialToActorArgs): Promise<CommandResponse> {
  return bridge.sendCommand('apply_material_to_actor', {
    actor_name: args.actor_name,
    material_path: args.material_path,
    material_slot: args.material_slot,
  });
}

export function applyMaterialToBlueprint(bridge: CommandSender, args: ApplyMaterialToBlueprintArgs): Promise<CommandResponse> {
  return bridge.sendCommand('apply_material_to_blueprint', {
    blueprint_name: args.blueprint_name,
    component_name: args.component_name,
    material_path: args.material_path,
    material_slot: args.material_slot,
  });
}

export function getActorMaterialInfo(bridge: CommandSender, args: GetActorMaterialInfoArgs): Promise<CommandResponse> {
  return bridge.sendCommand('get_actor_material_info', { actor_name: args.actor_name });
}

export function getBlueprintMaterialInfo(bridge: CommandSender, args: GetBlueprintMaterialInfoArgs): Promise<CommandResponse> {
  return bridge.sendCommand('get_blueprint_material_info', {
    blueprint_name: args.blueprint_name,
    component_name: args.component_name,
  });
}

/**
 * Clamp each channel to 0..1 and give RGB colors an opaque alpha.
 */
export function toRgba(color: ColorArg): [number, number, number, number] {
  const clamp = (value: number) => Math.min(1, Math.max(0, value));
  const [r, g, b] = color;
  const a = color.length === 4 ? color[3] : 1;
  return [clamp(r), clamp(g), clamp(b), clamp(a)];
}

/**
 * Set a mesh color by writing both the BaseColor and Color parameters.
 * Succeeds when either write succeeds.
 */
export async function setMeshMaterialColor(bridge: CommandSender, args: SetMeshMaterialColorArgs): Promise<MaterialColorResult> {
  const color = toRgba(args.color);

  const send = (parameterName: string) => {
    const params: JsonObject = {
      blueprint_name: args.blueprint_name,
      component_name: args.component_name,
      color,
      material_path: args.material_path,
      parameter_name: parameterName,
      material_slot: args.material_slot,
    };
    return bridge.sendCommand('set_mesh_material_color', params);
  };

  const baseColor = await send('BaseColor');
  const plainColor = await send('Color');
  const success = baseColor.status === 'success' || plainColor.status === 'success';

  return {
    success,
    message: success
      ? `Color applied successfully to slot ${args.material_slot}: [${color.join(', ')}]`
      : `Failed to set color parameters on slot ${args.material_slot}`,
    color,
    material_slot: args.material_slot,
    results: { BaseColor: baseColor, Color: plainColor },
  };
}
