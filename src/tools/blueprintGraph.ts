// src/tools/blueprintGraph.ts
// Blueprint graph editing: nodes, pins, variables and function graphs.
// Each tool is one command; `function_name` targets a function graph instead
// of the EventGraph.

import { z } from 'zod';

import type { CommandResponse, CommandSender, JsonObject } from '../connection/types.js';
import { JsonValueSchema } from './shared.js';

export const NODE_TYPES = [
  // control flow
  'Branch', 'Comparison', 'Switch', 'SwitchEnum', 'SwitchInteger', 'ExecutionSequence',
  // data
  'VariableGet', 'VariableSet', 'MakeArray',
  // casting
  'DynamicCast', 'ClassDynamicCast', 'CastByteToEnum',
  // utility
  'Print', 'CallFunction', 'Select', 'SpawnActor',
  // specialized
  'Timeline', 'GetDataTableRow', 'AddComponentByClass', 'Self', 'Knot',
  // event
  'Event',
] as const;

export const VARIABLE_TYPES = ['bool', 'int', 'float', 'string', 'vector', 'rotator'] as const;

/** Copy the keys of `source` whose value is set (not undefined, null or '') */
function definedParams(source: Record<string, string | number | boolean | null | undefined>): JsonObject {
  const params: JsonObject = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== null && value !== '') {
      params[key] = value;
    }
  }
  return params;
}

// ─────────────────────────────────────────────────────────────────────────────
// Nodes
// ─────────────────────────────────────────────────────────────────────────────

export const AddNodeArgs = z.object({
  blueprint_name: z.string().min(1),
  node_type: z.enum(NODE_TYPES),
  pos_x: z.number().default(0),
  pos_y: z.number().default(0),
  message: z.string().default(''),
  event_type: z.string().default('BeginPlay'),
  variable_name: z.string().default(''),
  target_function: z.string().default(''),
  target_blueprint: z.string().optional(),
  function_name: z.string().optional(),
});
export type AddNodeArgs = z.infer<typeof AddNodeArgs>;

export function addNode(bridge: CommandSender, args: AddNodeArgs): Promise<CommandResponse> {
  return bridge.sendCommand('add_node', {
    blueprint_name: args.blueprint_name,
    node_type: args.node_type,
    node_params: {
      pos_x: args.pos_x,
      pos_y: args.pos_y,
      ...definedParams({
        message: args.message,
        event_type: args.event_type,
        variable_name: args.variable_name,
        target_function: args.target_function,
        target_blueprint: args.target_blueprint,
        function_name: args.function_name,
      }),
    },
  });
}

export const ConnectNodesArgs = z.object({
  blueprint_name: z.string().min(1),
  source_node_id: z.string().min(1),
  source_pin_name: z.string().min(1),
  target_node_id: z.string().min(1),
  target_pin_name: z.string().min(1),
  function_name: z.string().optional(),
});
export type ConnectNodesArgs = z.infer<typeof ConnectNodesArgs>;

export function connectNodes(bridge: CommandSender, args: ConnectNodesArgs): Promise<CommandResponse> {
  return bridge.sendCommand('connect_nodes', {
    blueprint_name: args.blueprint_name,
    source_node_id: args.source_node_id,
    source_pin_name: args.source_pin_name,
    target_node_id: args.target_node_id,
    target_pin_name: args.target_pin_name,
    ...definedParams({ function_name: args.function_name }),
  });
}

export const AddEventNodeArgs = z.object({
  blueprint_name: z.string().min(1),
  event_name: z.string().min(1),
  pos_x: z.number().default(0),
  pos_y: z.number().default(0),
});
export type AddEventNodeArgs = z.infer<typeof AddEventNodeArgs>;

export function addEventNode(bridge: CommandSender, args: AddEventNodeArgs): Promise<CommandResponse> {
  return bridge.sendCommand('add_event_node', {
    blueprint_name: args.blueprint_name,
    event_name: args.event_name,
    pos_x: args.pos_x,
    pos_y: args.pos_y,
  });
}

export const DeleteNodeArgs = z.object({
  blueprint_name: z.string().min(1),
  node_id: z.string().min(1),
  function_name: z.string().optional(),
});
export type DeleteNodeArgs = z.infer<typeof DeleteNodeArgs>;

export function deleteNode(bridge: CommandSender, args: DeleteNodeArgs): Promise<CommandResponse> {
  return bridge.sendCommand('delete_node', {
    blueprint_name: args.blueprint_name,
    node_id: args.node_id,
    ...definedParams({ function_name: args.function_name }),
  });
}

export const NODE_PROPERTY_ACTIONS = [
  'add_pin', 'remove_pin', 'set_pin_type', 'set_enum_type', 'set_num_elements',
  'set_value_type', 'set_cast_target', 'set_function_call', 'set_event_type',
] as const;

export const SetNodePropertyArgs = z.object({
  blueprint_name: z.string().min(1),
  node_id: z.string().min(1),
  property_name: z.string().default(''),
  property_value: JsonValueSchema.optional(),
  function_name: z.string().optional(),
  action: z.enum(NODE_PROPERTY_ACTIONS).optional(),
  pin_type: z.string().optional(),
  pin_name: z.string().optional(),
  enum_type: z.string().optional(),
  new_type: z.string().optional(),
  target_type: z.string().optional(),
  target_function: z.string().optional(),
  target_class: z.string().optional(),
  event_type: z.string().optional(),
});
export type SetNodePropertyArgs = z.infer<typeof SetNodePropertyArgs>;

/**
 * Either set a plain property (`property_name` + `property_value`) or run a
 * semantic edit (`action` plus whichever of its parameters apply).
 */
export function setNodeProperty(bridge: CommandSender, args: SetNodePropertyArgs): Promise<CommandResponse> {
  const params: JsonObject = {
    blueprint_name: args.blueprint_name,
    node_id: args.node_id,
    ...definedParams({
      property_name: args.property_name,
      function_name: args.function_name,
      action: args.action,
      pin_type: args.pin_type,
      pin_name: args.pin_name,
      enum_type: args.enum_type,
      new_type: args.new_type,
      target_type: args.target_type,
      target_function: args.target_function,
      target_class: args.target_class,
      event_type: args.event_type,
    }),
  };
  if (args.property_value !== undefined) {
    params.property_value = args.property_value;
  }
  return bridge.sendCommand('set_node_property', params);
}

// ─────────────────────────────────────────────────────────────────────────────
// Variables
// ─────────────────────────────────────────────────────────────────────────────

export const CreateVariableArgs = z.object({
  blueprint_name: z.string().min(1),
  variable_name: z.string().min(1),
  variable_type: z.enum(VARIABLE_TYPES),
  default_value: JsonValueSchema.optional(),
  is_public: z.boolean().default(false),
  tooltip: z.string().default(''),
  category: z.string().default('Default'),
});
export type CreateVariableArgs = z.infer<typeof CreateVariableArgs>;

export function createVariable(bridge: CommandSender, args: CreateVariableArgs): Promise<CommandResponse> {
  const params: JsonObject = {
    blueprint_name: args.blueprint_name,
    variable_name: args.variable_name,
    variable_type: args.variable_type,
    is_public: args.is_public,
    tooltip: args.tooltip,
    category: args.category,
  };
  if (args.default_value !== undefined) {
    params.default_value = args.default_value;
  }
  return bridge.sendCommand('create_variable', params);
}

export const SetVariablePropertiesArgs = z.object({
  blueprint_name: z.string().min(1),
  variable_name: z.string().min(1),
  var_name: z.string().optional(),
  var_type: z.string().optional(),
  is_blueprint_readable: z.boolean().optional(),
  is_blueprint_writable: z.boolean().optional(),
  is_public: z.boolean().optional(),
  is_editable_in_instance: z.boolean().optional(),
  tooltip: z.string().optional(),
  category: z.string().optional(),
  default_value: JsonValueSchema.optional(),
  expose_on_spawn: z.boolean().optional(),
  expose_to_cinematics: z.boolean().optional(),
  replication_enabled: z.boolean().optional(),
  replication_condition: z.number().int().min(0).max(7).optional(),
});
export type SetVariablePropertiesArgs = z.infer<typeof SetVariablePropertiesArgs>;

/**
 * Change an existing variable in place; only the given properties are sent,
 * so Get/Set nodes bound to the variable survive.
 */
export function setBlueprintVariableProperties(bridge: CommandSender, args: SetVariablePropertiesArgs): Promise<CommandResponse> {
  const { blueprint_name, variable_name, default_value, ...changes } = args;
  const params: JsonObject = {
    blueprint_name,
    variable_name,
    ...definedParams(changes),
  };
  if (default_value !== undefined) {
    params.default_value = default_value;
  }
  return bridge.sendCommand('set_blueprint_variable_properties', params);
}

// ─────────────────────────────────────────────────────────────────────────────
// Functions
// ─────────────────────────────────────────────────────────────────────────────

export const CreateFunctionArgs = z.object({
  blueprint_name: z.string().min(1),
  function_name: z.string().min(1),
  return_type: z.string().default('void'),
});
export type CreateFunctionArgs = z.infer<typeof CreateFunctionArgs>;

export function createFunction(bridge: CommandSender, args: CreateFunctionArgs): Promise<CommandResponse> {
  return bridge.sendCommand('create_function', {
    blueprint_name: args.blueprint_name,
    function_name: args.function_name,
    return_type: args.return_type,
  });
}

export const FunctionParamArgs = z.object({
  blueprint_name: z.string().min(1),
  function_name: z.string().min(1),
  param_name: z.string().min(1),
  param_type: z.string().min(1),
  is_array: z.boolean().default(false),
});
export type FunctionParamArgs = z.infer<typeof FunctionParamArgs>;

export function addFunctionInput(bridge: CommandSender, args: FunctionParamArgs): Promise<CommandResponse> {
  return bridge.sendCommand('add_function_input', {
    blueprint_name: args.blueprint_name,
    function_name: args.function_name,
    param_name: args.param_name,
    param_type: args.param_type,
    is_array: args.is_array,
  });
}

export function addFunctionOutput(bridge: CommandSender, args: FunctionParamArgs): Promise<CommandResponse> {
  return bridge.sendCommand('add_function_output', {
    blueprint_name: args.blueprint_name,
    function_name: args.function_name,
    param_name: args.param_name,
    param_type: args.param_type,
    is_array: args.is_array,
  });
}

export const DeleteFunctionArgs = z.object({
  blueprint_name: z.string().min(1),
  function_name: z.string().min(1),
});
export type DeleteFunctionArgs = z.infer<typeof DeleteFunctionArgs>;

export function deleteFunction(bridge: CommandSender, args: DeleteFunctionArgs): Promise<CommandResponse> {
  return bridge.sendCommand('delete_function', {
    blueprint_name: args.blueprint_name,
    function_name: args.function_name,
  });
}

export const RenameFunctionArgs = z.object({
  blueprint_name: z.string().min(1),
  old_function_name: z.string().min(1),
  new_function_name: z.string().min(1),
});
export type RenameFunctionArgs = z.infer<typeof RenameFunctionArgs>;

export function renameFunction(bridge: CommandSender, args: RenameFunctionArgs): Promise<CommandResponse> {
  return bridge.sendCommand('rename_function', {
    blueprint_name: args.blueprint_name,
    old_function_name: args.old_function_name,
    new_function_name: args.new_function_name,
  });
}
