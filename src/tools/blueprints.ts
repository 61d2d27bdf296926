// src/tools/blueprints.ts
// Blueprint asset tools: creation, components, physics, compilation and
// read-only inspection

import { z } from 'zod';

import { type CommandResponse, type CommandSender, type JsonValue, isJsonObject } from '../connection/types.js';
import { createLogger } from '../logger.js';
import { setActorTransform } from './actors.js';
import { DEFAULT_MATERIAL_PATH, setMeshMaterialColor } from './materials.js';
import { ColorArg, DEFAULT_CUBE_MESH, JsonObjectSchema, Vector3 } from './shared.js';

const log = createLogger('BlueprintTools');

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const CreateBlueprintArgs = z.object({
  name: z.string().min(1),
  parent_class: z.string().default('Actor'),
});
export type CreateBlueprintArgs = z.infer<typeof CreateBlueprintArgs>;

export const AddComponentToBlueprintArgs = z.object({
  blueprint_name: z.string().min(1),
  component_type: z.string().min(1),
  component_name: z.string().min(1),
  location: z.array(z.number()).default([]),
  rotation: z.array(z.number()).default([]),
  scale: z.array(z.number()).default([]),
  component_properties: JsonObjectSchema.default({}),
});
export type AddComponentToBlueprintArgs = z.infer<typeof AddComponentToBlueprintArgs>;

export const SetStaticMeshPropertiesArgs = z.object({
  blueprint_name: z.string().min(1),
  component_name: z.string().min(1),
  static_mesh: z.string().default(DEFAULT_CUBE_MESH),
});
export type SetStaticMeshPropertiesArgs = z.infer<typeof SetStaticMeshPropertiesArgs>;

export const SetPhysicsPropertiesArgs = z.object({
  blueprint_name: z.string().min(1),
  component_name: z.string().min(1),
  simulate_physics: z.boolean().default(true),
  gravity_enabled: z.boolean().default(true),
  mass: z.number().positive().default(1),
  linear_damping: z.number().min(0).default(0.01),
  angular_damping: z.number().min(0).default(0),
});
export type SetPhysicsPropertiesArgs = z.infer<typeof SetPhysicsPropertiesArgs>;

export const CompileBlueprintArgs = z.object({
  blueprint_name: z.string().min(1),
});
export type CompileBlueprintArgs = z.infer<typeof CompileBlueprintArgs>;

export const SpawnBlueprintActorArgs = z.object({
  blueprint_name: z.string().min(1),
  actor_name: z.string().min(1),
  location: Vector3.default([0, 0, 0]),
  rotation: Vector3.default([0, 0, 0]),
});
export type SpawnBlueprintActorArgs = z.infer<typeof SpawnBlueprintActorArgs>;

export const SpawnPhysicsBlueprintActorArgs = z.object({
  name: z.string().min(1),
  mesh_path: z.string().default(DEFAULT_CUBE_MESH),
  location: Vector3.default([0, 0, 0]),
  mass: z.number().positive().default(1),
  simulate_physics: z.boolean().default(true),
  gravity_enabled: z.boolean().default(true),
  color: ColorArg.optional(),
  scale: Vector3.default([1, 1, 1]),
});
export type SpawnPhysicsBlueprintActorArgs = z.infer<typeof SpawnPhysicsBlueprintActorArgs>;

export const ReadBlueprintContentArgs = z.object({
  blueprint_path: z.string().min(1),
  include_event_graph: z.boolean().default(true),
  include_functions: z.boolean().default(true),
  include_variables: z.boolean().default(true),
  include_components: z.boolean().default(true),
  include_interfaces: z.boolean().default(true),
});
export type ReadBlueprintContentArgs = z.infer<typeof ReadBlueprintContentArgs>;

export const AnalyzeBlueprintGraphArgs = z.object({
  blueprint_path: z.string().min(1),
  graph_name: z.string().default('EventGraph'),
  include_node_details: z.boolean().default(true),
  include_pin_connections: z.boolean().default(true),
  trace_execution_flow: z.boolean().default(true),
});
export type AnalyzeBlueprintGraphArgs = z.infer<typeof AnalyzeBlueprintGraphArgs>;

export const GetBlueprintVariableDetailsArgs = z.object({
  blueprint_path: z.string().min(1),
  variable_name: z.string().optional(),
});
export type GetBlueprintVariableDetailsArgs = z.infer<typeof GetBlueprintVariableDetailsArgs>;

export const GetBlueprintFunctionDetailsArgs = z.object({
  blueprint_path: z.string().min(1),
  function_name: z.string().optional(),
  include_graph: z.boolean().default(true),
});
export type GetBlueprintFunctionDetailsArgs = z.infer<typeof GetBlueprintFunctionDetailsArgs>;

export const OpenAssetInEditorArgs = z.object({
  asset_path: z.string().min(1),
});
export type OpenAssetInEditorArgs = z.infer<typeof OpenAssetInEditorArgs>;

// ─────────────────────────────────────────────────────────────────────────────
// Authoring
// ─────────────────────────────────────────────────────────────────────────────

export function createBlueprint(bridge: CommandSender, args: CreateBlueprintArgs): Promise<CommandResponse> {
  return bridge.sendCommand('create_blueprint', { name: args.name, parent_class: args.parent_class });
}

export function addComponentToBlueprint(bridge: CommandSender, args: AddComponentToBlueprintArgs): Promise<CommandResponse> {
  return bridge.sendCommand('add_component_to_blueprint', {
    blueprint_name: args.blueprint_name,
    component_type: args.component_type,
    component_name: args.component_name,
    location: args.location,
    rotation: args.rotation,
    scale: args.scale,
    component_properties: args.component_properties,
  });
}

export function setStaticMeshProperties(bridge: CommandSender, args: SetStaticMeshPropertiesArgs): Promise<CommandResponse> {
  return bridge.sendCommand('set_static_mesh_properties', {
    blueprint_name: args.blueprint_name,
    component_name: args.component_name,
    static_mesh: args.static_mesh,
  });
}

export function setPhysicsProperties(bridge: CommandSender, args: SetPhysicsPropertiesArgs): Promise<CommandResponse> {
  return bridge.sendCommand('set_physics_properties', {
    blueprint_name: args.blueprint_name,
    component_name: args.component_name,
    simulate_physics: args.simulate_physics,
    gravity_enabled: args.gravity_enabled,
    mass: args.mass,
    linear_damping: args.linear_damping,
    angular_damping: args.angular_damping,
  });
}

export function compileBlueprint(bridge: CommandSender, args: CompileBlueprintArgs): Promise<CommandResponse> {
  return bridge.sendCommand('compile_blueprint', { blueprint_name: args.blueprint_name });
}

export function spawnBlueprintActor(bridge: CommandSender, args: SpawnBlueprintActorArgs): Promise<CommandResponse> {
  return bridge.sendCommand('spawn_blueprint_actor', {
    blueprint_name: args.blueprint_name,
    actor_name: args.actor_name,
    location: args.location,
    rotation: args.rotation,
  });
}

/**
 * Build a throwaway `<name>_BP` Blueprint with one physics-enabled mesh,
 * optionally colored, compile it and spawn one instance of it.
 */
export async function spawnPhysicsBlueprintActor(bridge: CommandSender, args: SpawnPhysicsBlueprintActorArgs): Promise<CommandResponse> {
  const blueprintName = `${args.name}_BP`;
  const steps: Array<[string, () => Promise<CommandResponse>]> = [
    ['create_blueprint', () => createBlueprint(bridge, { name: blueprintName, parent_class: 'Actor' })],
    ['add_component_to_blueprint', () => addComponentToBlueprint(bridge, {
      blueprint_name: blueprintName,
      component_type: 'StaticMeshComponent',
      component_name: 'Mesh',
      location: [],
      rotation: [],
      scale: args.scale,
      component_properties: {},
    })],
    ['set_static_mesh_properties', () => setStaticMeshProperties(bridge, {
      blueprint_name: blueprintName,
      component_name: 'Mesh',
      static_mesh: args.mesh_path,
    })],
    ['set_physics_properties', () => setPhysicsProperties(bridge, {
      blueprint_name: blueprintName,
      component_name: 'Mesh',
      simulate_physics: args.simulate_physics,
      gravity_enabled: args.gravity_enabled,
      mass: args.mass,
      linear_damping: 0.01,
      angular_damping: 0,
    })],
  ];

  for (const [step, run] of steps) {
    const response = await run();
    if (response.status === 'error') {
      return { status: 'error', error: `${step} failed for ${blueprintName}: ${response.error}` };
    }
  }

  if (args.color) {
    const colored = await setMeshMaterialColor(bridge, {
      blueprint_name: blueprintName,
      component_name: 'Mesh',
      color: args.color,
      material_path: DEFAULT_MATERIAL_PATH,
      material_slot: 0,
    });
    if (!colored.success) {
      log.warn(`Failed to set color for ${blueprintName}: ${colored.message}`);
    }
  }

  const compiled = await compileBlueprint(bridge, { blueprint_name: blueprintName });
  if (compiled.status === 'error') {
    return { status: 'error', error: `compile_blueprint failed for ${blueprintName}: ${compiled.error}` };
  }

  const spawned = await spawnBlueprintActor(bridge, {
    blueprint_name: blueprintName,
    actor_name: args.name,
    location: args.location,
    rotation: [0, 0, 0],
  });

  if (spawned.status === 'success') {
    const result = spawned.result;
    const spawnedName = isJsonObject(result) && typeof result.name === 'string' ? result.name : args.name;
    await setActorTransform(bridge, { name: spawnedName, scale: args.scale });
  }

  return spawned;
}

// ─────────────────────────────────────────────────────────────────────────────
// Inspection
// ─────────────────────────────────────────────────────────────────────────────

function countOf(value: JsonValue | undefined): number {
  return Array.isArray(value) ? value.length : 0;
}

export async function readBlueprintContent(bridge: CommandSender, args: ReadBlueprintContentArgs): Promise<CommandResponse> {
  log.info(`Reading Blueprint content for: ${args.blueprint_path}`);
  const response = await bridge.sendCommand('read_blueprint_content', {
    blueprint_path: args.blueprint_path,
    include_event_graph: args.include_event_graph,
    include_functions: args.include_functions,
    include_variables: args.include_variables,
    include_components: args.include_components,
    include_interfaces: args.include_interfaces,
  });

  if (response.status === 'success') {
    log.info(
      `Blueprint ${args.blueprint_path}: ${countOf(response.variables)} variables, ` +
        `${countOf(response.functions)} functions, ${countOf(response.components)} components`
    );
  }
  return response;
}

export function analyzeBlueprintGraph(bridge: CommandSender, args: AnalyzeBlueprintGraphArgs): Promise<CommandResponse> {
  log.info(`Analyzing Blueprint graph: ${args.blueprint_path} -> ${args.graph_name}`);
  return bridge.sendCommand('analyze_blueprint_graph', {
    blueprint_path: args.blueprint_path,
    graph_name: args.graph_name,
    include_node_details: args.include_node_details,
    include_pin_connections: args.include_pin_connections,
    trace_execution_flow: args.trace_execution_flow,
  });
}

/**
 * Without `variable_name` the editor returns every variable.
 */
export function getBlueprintVariableDetails(bridge: CommandSender, args: GetBlueprintVariableDetailsArgs): Promise<CommandResponse> {
  return bridge.sendCommand('get_blueprint_variable_details', {
    blueprint_path: args.blueprint_path,
    variable_name: args.variable_name ?? null,
  });
}

export function getBlueprintFunctionDetails(bridge: CommandSender, args: GetBlueprintFunctionDetailsArgs): Promise<CommandResponse> {
  return bridge.sendCommand('get_blueprint_function_details', {
    blueprint_path: args.blueprint_path,
    function_name: args.function_name ?? null,
    include_graph: args.include_graph,
  });
}

export function openAssetInEditor(bridge: CommandSender, args: OpenAssetInEditorArgs): Promise<CommandResponse> {
  log.info(`Opening asset in editor: ${args.asset_path}`);
  return bridge.sendCommand('open_asset_in_editor', { asset_path: args.asset_path });
}
