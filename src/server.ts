// src/server.ts
// MCP server exposing Unreal Editor operations as tools. Every editor tool
// goes through the registry's shared dispatcher, so calls are serialized on
// the one editor socket.

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema, type Tool } from '@modelcontextprotocol/sdk/types.js';

import { type ConnectionRegistry, defaultRegistry } from './connection/registry.js';
import type { CommandSender } from './connection/types.js';
import { createLogger } from './logger.js';
import * as actorTools from './tools/actors.js';
import * as blueprintTools from './tools/blueprints.js';
import * as graphTools from './tools/blueprintGraph.js';
import * as diagnosticTools from './tools/diagnostics.js';
import * as materialTools from './tools/materials.js';
import { parseArgs } from './tools/shared.js';
import * as structureTools from './tools/structures.js';

const log = createLogger('Server');

export const SERVER_NAME = 'unreal-mcp-bridge';
export const SERVER_VERSION = '1.0.0';

const vector3 = { type: 'array', items: { type: 'number' }, minItems: 3, maxItems: 3 };
const color = { type: 'array', items: { type: 'number' }, minItems: 3, maxItems: 4, description: 'RGB or RGBA, 0..1' };

export const TOOL_DEFINITIONS: Tool[] = [
  // Actor tools
  { name: 'get_actors_in_level', description: 'List all actors in the current level', inputSchema: { type: 'object', properties: {} } },
  { name: 'find_actors_by_name', description: 'Find actors whose name matches a pattern', inputSchema: { type: 'object', properties: { pattern: { type: 'string' } }, required: ['pattern'] } },
  { name: 'spawn_actor', description: 'Spawn an actor in the level', inputSchema: { type: 'object', properties: { name: { type: 'string' }, type: { type: 'string', default: 'StaticMeshActor' }, location: vector3, rotation: vector3, scale: vector3, static_mesh: { type: 'string' } }, required: ['name'] } },
  { name: 'delete_actor', description: 'Delete an actor by name', inputSchema: { type: 'object', properties: { name: { type: 'string' } }, required: ['name'] } },
  { name: 'set_actor_transform', description: 'Set location, rotation and/or scale of an actor', inputSchema: { type: 'object', properties: { name: { type: 'string' }, location: vector3, rotation: vector3, scale: vector3 }, required: ['name'] } },

  // Blueprint tools
  { name: 'create_blueprint', description: 'Create a Blueprint class', inputSchema: { type: 'object', properties: { name: { type: 'string' }, parent_class: { type: 'string', default: 'Actor' } }, required: ['name'] } },
  { name: 'add_component_to_blueprint', description: 'Add a component to a Blueprint', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, component_type: { type: 'string' }, component_name: { type: 'string' }, location: vector3, rotation: vector3, scale: vector3, component_properties: { type: 'object' } }, required: ['blueprint_name', 'component_type', 'component_name'] } },
  { name: 'set_static_mesh_properties', description: 'Set the mesh of a StaticMeshComponent', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, component_name: { type: 'string' }, static_mesh: { type: 'string', default: '/Engine/BasicShapes/Cube.Cube' } }, required: ['blueprint_name', 'component_name'] } },
  { name: 'set_physics_properties', description: 'Set physics properties of a component', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, component_name: { type: 'string' }, simulate_physics: { type: 'boolean', default: true }, gravity_enabled: { type: 'boolean', default: true }, mass: { type: 'number', default: 1 }, linear_damping: { type: 'number', default: 0.01 }, angular_damping: { type: 'number', default: 0 } }, required: ['blueprint_name', 'component_name'] } },
  { name: 'compile_blueprint', description: 'Compile a Blueprint', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' } }, required: ['blueprint_name'] } },
  { name: 'spawn_blueprint_actor', description: 'Spawn an instance of a Blueprint', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, actor_name: { type: 'string' }, location: vector3, rotation: vector3 }, required: ['blueprint_name', 'actor_name'] } },
  { name: 'spawn_physics_blueprint_actor', description: 'Create, compile and spawn a physics-enabled mesh Blueprint', inputSchema: { type: 'object', properties: { name: { type: 'string' }, mesh_path: { type: 'string' }, location: vector3, mass: { type: 'number', default: 1 }, simulate_physics: { type: 'boolean', default: true }, gravity_enabled: { type: 'boolean', default: true }, color, scale: vector3 }, required: ['name'] } },
  { name: 'read_blueprint_content', description: 'Read variables, functions, components and graphs of a Blueprint', inputSchema: { type: 'object', properties: { blueprint_path: { type: 'string' }, include_event_graph: { type: 'boolean' }, include_functions: { type: 'boolean' }, include_variables: { type: 'boolean' }, include_components: { type: 'boolean' }, include_interfaces: { type: 'boolean' } }, required: ['blueprint_path'] } },
  { name: 'analyze_blueprint_graph', description: 'Analyze nodes, connections and execution flow of a Blueprint graph', inputSchema: { type: 'object', properties: { blueprint_path: { type: 'string' }, graph_name: { type: 'string', default: 'EventGraph' }, include_node_details: { type: 'boolean' }, include_pin_connections: { type: 'boolean' }, trace_execution_flow: { type: 'boolean' } }, required: ['blueprint_path'] } },
  { name: 'get_blueprint_variable_details', description: 'Get details of one or all Blueprint variables', inputSchema: { type: 'object', properties: { blueprint_path: { type: 'string' }, variable_name: { type: 'string' } }, required: ['blueprint_path'] } },
  { name: 'get_blueprint_function_details', description: 'Get details of one or all Blueprint functions', inputSchema: { type: 'object', properties: { blueprint_path: { type: 'string' }, function_name: { type: 'string' }, include_graph: { type: 'boolean', default: true } }, required: ['blueprint_path'] } },
  { name: 'open_asset_in_editor', description: 'Open an asset in its editor', inputSchema: { type: 'object', properties: { asset_path: { type: 'string' } }, required: ['asset_path'] } },

  // Material tools
  { name: 'get_available_materials', description: 'List materials under a content path', inputSchema: { type: 'object', properties: { search_path: { type: 'string', default: '/Game/' }, include_engine_materials: { type: 'boolean', default: true } } } },
  { name: 'apply_material_to_actor', description: 'Apply a material to a level actor', inputSchema: { type: 'object', properties: { actor_name: { type: 'string' }, material_path: { type: 'string' }, material_slot: { type: 'number', default: 0 } }, required: ['actor_name', 'material_path'] } },
  { name: 'apply_material_to_blueprint', description: 'Apply a material to a Blueprint component', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, component_name: { type: 'string' }, material_path: { type: 'string' }, material_slot: { type: 'number', default: 0 } }, required: ['blueprint_name', 'component_name', 'material_path'] } },
  { name: 'get_actor_material_info', description: 'Get the materials of a level actor', inputSchema: { type: 'object', properties: { actor_name: { type: 'string' } }, required: ['actor_name'] } },
  { name: 'get_blueprint_material_info', description: 'Get the materials of a Blueprint component', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, component_name: { type: 'string' } }, required: ['blueprint_name', 'component_name'] } },
  { name: 'set_mesh_material_color', description: 'Set the color of a Blueprint mesh material', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, component_name: { type: 'string' }, color, material_path: { type: 'string' }, material_slot: { type: 'number', default: 0 } }, required: ['blueprint_name', 'component_name', 'color'] } },

  // Blueprint graph tools
  { name: 'add_node', description: 'Add a node to a Blueprint event graph or function graph', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, node_type: { type: 'string', enum: [...graphTools.NODE_TYPES] }, pos_x: { type: 'number' }, pos_y: { type: 'number' }, message: { type: 'string' }, event_type: { type: 'string', default: 'BeginPlay' }, variable_name: { type: 'string' }, target_function: { type: 'string' }, target_blueprint: { type: 'string' }, function_name: { type: 'string' } }, required: ['blueprint_name', 'node_type'] } },
  { name: 'connect_nodes', description: 'Connect an output pin to an input pin', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, source_node_id: { type: 'string' }, source_pin_name: { type: 'string' }, target_node_id: { type: 'string' }, target_pin_name: { type: 'string' }, function_name: { type: 'string' } }, required: ['blueprint_name', 'source_node_id', 'source_pin_name', 'target_node_id', 'target_pin_name'] } },
  { name: 'create_variable', description: 'Create a Blueprint variable', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, variable_name: { type: 'string' }, variable_type: { type: 'string', enum: [...graphTools.VARIABLE_TYPES] }, default_value: {}, is_public: { type: 'boolean', default: false }, tooltip: { type: 'string' }, category: { type: 'string', default: 'Default' } }, required: ['blueprint_name', 'variable_name', 'variable_type'] } },
  { name: 'set_blueprint_variable_properties', description: 'Change properties of an existing Blueprint variable in place', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, variable_name: { type: 'string' }, var_name: { type: 'string', description: 'New name' }, var_type: { type: 'string' }, is_blueprint_readable: { type: 'boolean' }, is_blueprint_writable: { type: 'boolean' }, is_public: { type: 'boolean' }, is_editable_in_instance: { type: 'boolean' }, tooltip: { type: 'string' }, category: { type: 'string' }, default_value: {}, expose_on_spawn: { type: 'boolean' }, expose_to_cinematics: { type: 'boolean' }, replication_enabled: { type: 'boolean' }, replication_condition: { type: 'number' } }, required: ['blueprint_name', 'variable_name'] } },
  { name: 'add_event_node', description: 'Add an event node such as ReceiveBeginPlay', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, event_name: { type: 'string' }, pos_x: { type: 'number' }, pos_y: { type: 'number' } }, required: ['blueprint_name', 'event_name'] } },
  { name: 'delete_node', description: 'Delete a node from a Blueprint graph', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, node_id: { type: 'string' }, function_name: { type: 'string' } }, required: ['blueprint_name', 'node_id'] } },
  { name: 'set_node_property', description: 'Set a node property or apply a pin/type action to a node', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, node_id: { type: 'string' }, property_name: { type: 'string' }, property_value: {}, function_name: { type: 'string' }, action: { type: 'string', enum: [...graphTools.NODE_PROPERTY_ACTIONS] }, pin_type: { type: 'string' }, pin_name: { type: 'string' }, enum_type: { type: 'string' }, new_type: { type: 'string' }, target_type: { type: 'string' }, target_function: { type: 'string' }, target_class: { type: 'string' }, event_type: { type: 'string' } }, required: ['blueprint_name', 'node_id'] } },
  { name: 'create_function', description: 'Create a Blueprint function', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, function_name: { type: 'string' }, return_type: { type: 'string', default: 'void' } }, required: ['blueprint_name', 'function_name'] } },
  { name: 'add_function_input', description: 'Add an input parameter to a Blueprint function', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, function_name: { type: 'string' }, param_name: { type: 'string' }, param_type: { type: 'string' }, is_array: { type: 'boolean', default: false } }, required: ['blueprint_name', 'function_name', 'param_name', 'param_type'] } },
  { name: 'add_function_output', description: 'Add an output parameter to a Blueprint function', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, function_name: { type: 'string' }, param_name: { type: 'string' }, param_type: { type: 'string' }, is_array: { type: 'boolean', default: false } }, required: ['blueprint_name', 'function_name', 'param_name', 'param_type'] } },
  { name: 'delete_function', description: 'Delete a Blueprint function', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, function_name: { type: 'string' } }, required: ['blueprint_name', 'function_name'] } },
  { name: 'rename_function', description: 'Rename a Blueprint function', inputSchema: { type: 'object', properties: { blueprint_name: { type: 'string' }, old_function_name: { type: 'string' }, new_function_name: { type: 'string' } }, required: ['blueprint_name', 'old_function_name', 'new_function_name'] } },

  // Structure tools
  { name: 'create_pyramid', description: 'Spawn a pyramid of cubes', inputSchema: { type: 'object', properties: { base_size: { type: 'number', default: 3 }, block_size: { type: 'number', default: 100 }, location: vector3, name_prefix: { type: 'string', default: 'PyramidBlock' }, mesh: { type: 'string' } } } },
  { name: 'create_wall', description: 'Spawn a wall of cubes', inputSchema: { type: 'object', properties: { length: { type: 'number', default: 5 }, height: { type: 'number', default: 2 }, block_size: { type: 'number', default: 100 }, location: vector3, orientation: { type: 'string', enum: ['x', 'y'], default: 'x' }, name_prefix: { type: 'string', default: 'WallBlock' }, mesh: { type: 'string' } } } },
  { name: 'create_staircase', description: 'Spawn a staircase of cubes', inputSchema: { type: 'object', properties: { steps: { type: 'number', default: 5 }, step_size: vector3, location: vector3, name_prefix: { type: 'string', default: 'Stair' }, mesh: { type: 'string' } } } },
  { name: 'create_arch', description: 'Spawn a semicircular arch of cubes', inputSchema: { type: 'object', properties: { radius: { type: 'number', default: 300 }, segments: { type: 'number', default: 6 }, location: vector3, name_prefix: { type: 'string', default: 'ArchBlock' }, mesh: { type: 'string' } } } },

  // Diagnostics
  { name: 'get_connection_status', description: 'Get the state of the editor connection', inputSchema: { type: 'object', properties: {} } },
  { name: 'reset_connection', description: 'Drop the editor connection; the next command reconnects', inputSchema: { type: 'object', properties: {} } },
  { name: 'get_logs', description: 'Get recent bridge logs', inputSchema: { type: 'object', properties: { level: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] }, source: { type: 'string' }, limit: { type: 'number', default: 50 } } } },
  { name: 'clear_logs', description: 'Clear the log buffer', inputSchema: { type: 'object', properties: {} } },
];

export function createServer(registry: ConnectionRegistry = defaultRegistry): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const bridge: CommandSender = {
      sendCommand: async (commandName, params) => (await registry.get()).sendCommand(commandName, params),
    };

    try {
      let result: unknown;

      switch (name) {
        // Actor tools
        case 'get_actors_in_level':
          result = await actorTools.getActorsInLevel(bridge);
          break;
        case 'find_actors_by_name':
          result = await actorTools.findActorsByName(bridge, parseArgs(name, actorTools.FindActorsByNameArgs, args));
          break;
        case 'spawn_actor':
          result = await actorTools.spawnActor(bridge, parseArgs(name, actorTools.SpawnActorArgs, args));
          break;
        case 'delete_actor':
          result = await actorTools.deleteActor(bridge, parseArgs(name, actorTools.DeleteActorArgs, args));
          break;
        case 'set_actor_transform':
          result = await actorTools.setActorTransform(bridge, parseArgs(name, actorTools.SetActorTransformArgs, args));
          break;

        // Blueprint tools
        case 'create_blueprint':
          result = await blueprintTools.createBlueprint(bridge, parseArgs(name, blueprintTools.CreateBlueprintArgs, args));
          break;
        case 'add_component_to_blueprint':
          result = await blueprintTools.addComponentToBlueprint(bridge, parseArgs(name, blueprintTools.AddComponentToBlueprintArgs, args));
          break;
        case 'set_static_mesh_properties':
          result = await blueprintTools.setStaticMeshProperties(bridge, parseArgs(name, blueprintTools.SetStaticMeshPropertiesArgs, args));
          break;
        case 'set_physics_properties':
          result = await blueprintTools.setPhysicsProperties(bridge, parseArgs(name, blueprintTools.SetPhysicsPropertiesArgs, args));
          break;
        case 'compile_blueprint':
          result = await blueprintTools.compileBlueprint(bridge, parseArgs(name, blueprintTools.CompileBlueprintArgs, args));
          break;
        case 'spawn_blueprint_actor':
          result = await blueprintTools.spawnBlueprintActor(bridge, parseArgs(name, blueprintTools.SpawnBlueprintActorArgs, args));
          break;
        case 'spawn_physics_blueprint_actor':
          result = await blueprintTools.spawnPhysicsBlueprintActor(bridge, parseArgs(name, blueprintTools.SpawnPhysicsBlueprintActorArgs, args));
          break;
        case 'read_blueprint_content':
          result = await blueprintTools.readBlueprintContent(bridge, parseArgs(name, blueprintTools.ReadBlueprintContentArgs, args));
          break;
        case 'analyze_blueprint_graph':
          result = await blueprintTools.analyzeBlueprintGraph(bridge, parseArgs(name, blueprintTools.AnalyzeBlueprintGraphArgs, args));
          break;
        case 'get_blueprint_variable_details':
          result = await blueprintTools.getBlueprintVariableDetails(bridge, parseArgs(name, blueprintTools.GetBlueprintVariableDetailsArgs, args));
          break;
        case 'get_blueprint_function_details':
          result = await blueprintTools.getBlueprintFunctionDetails(bridge, parseArgs(name, blueprintTools.GetBlueprintFunctionDetailsArgs, args));
          break;
        case 'open_asset_in_editor':
          result = await blueprintTools.openAssetInEditor(bridge, parseArgs(name, blueprintTools.OpenAssetInEditorArgs, args));
          break;

        // Material tools
        case 'get_available_materials':
          result = await materialTools.getAvailableMaterials(bridge, parseArgs(name, materialTools.GetAvailableMaterialsArgs, args));
          break;
        case 'apply_material_to_actor':
          result = await materialTools.applyMaterialToActor(bridge, parseArgs(name, materialTools.ApplyMaterialToActorArgs, args));
          break;
        case 'apply_material_to_blueprint':
          result = await materialTools.applyMaterialToBlueprint(bridge, parseArgs(name, materialTools.ApplyMaterialToBlueprintArgs, args));
          break;
        case 'get_actor_material_info':
          result = await materialTools.getActorMaterialInfo(bridge, parseArgs(name, materialTools.GetActorMaterialInfoArgs, args));
          break;
        case 'get_blueprint_material_info':
          result = await materialTools.getBlueprintMaterialInfo(bridge, parseArgs(name, materialTools.GetBlueprintMaterialInfoArgs, args));
          break;
        case 'set_mesh_material_color':
          result = await materialTools.setMeshMaterialColor(bridge, parseArgs(name, materialTools.SetMeshMaterialColorArgs, args));
          break;

        // Blueprint graph tools
        case 'add_node':
          result = await graphTools.addNode(bridge, parseArgs(name, graphTools.AddNodeArgs, args));
          break;
        case 'connect_nodes':
          result = await graphTools.connectNodes(bridge, parseArgs(name, graphTools.ConnectNodesArgs, args));
          break;
        case 'create_variable':
          result = await graphTools.createVariable(bridge, parseArgs(name, graphTools.CreateVariableArgs, args));
          break;
        case 'set_blueprint_variable_properties':
          result = await graphTools.setBlueprintVariableProperties(bridge, parseArgs(name, graphTools.SetVariablePropertiesArgs, args));
          break;
        case 'add_event_node':
          result = await graphTools.addEventNode(bridge, parseArgs(name, graphTools.AddEventNodeArgs, args));
          break;
        case 'delete_node':
          result = await graphTools.deleteNode(bridge, parseArgs(name, graphTools.DeleteNodeArgs, args));
          break;
        case 'set_node_property':
          result = await graphTools.setNodeProperty(bridge, parseArgs(name, graphTools.SetNodePropertyArgs, args));
          break;
        case 'create_function':
          result = await graphTools.createFunction(bridge, parseArgs(name, graphTools.CreateFunctionArgs, args));
          break;
        case 'add_function_input':
          result = await graphTools.addFunctionInput(bridge, parseArgs(name, graphTools.FunctionParamArgs, args));
          break;
        case 'add_function_output':
          result = await graphTools.addFunctionOutput(bridge, parseArgs(name, graphTools.FunctionParamArgs, args));
          break;
        case 'delete_function':
          result = await graphTools.deleteFunction(bridge, parseArgs(name, graphTools.DeleteFunctionArgs, args));
          break;
        case 'rename_function':
          result = await graphTools.renameFunction(bridge, parseArgs(name, graphTools.RenameFunctionArgs, args));
          break;

        // Structure tools
        case 'create_pyramid':
          result = await structureTools.createPyramid(bridge, parseArgs(name, structureTools.CreatePyramidArgs, args));
          break;
        case 'create_wall':
          result = await structureTools.createWall(bridge, parseArgs(name, structureTools.CreateWallArgs, args));
          break;
        case 'create_staircase':
          result = await structureTools.createStaircase(bridge, parseArgs(name, structureTools.CreateStaircaseArgs, args));
          break;
        case 'create_arch':
          result = await structureTools.createArch(bridge, parseArgs(name, structureTools.CreateArchArgs, args));
          break;

        // Diagnostics
        case 'get_connection_status':
          result = diagnosticTools.getConnectionStatus(registry);
          break;
        case 'reset_connection':
          result = await diagnosticTools.resetConnection(registry);
          break;
        case 'get_logs':
          result = diagnosticTools.getLogs(parseArgs(name, diagnosticTools.GetLogsArgs, args));
          break;
        case 'clear_logs':
          result = diagnosticTools.clearLogs();
          break;

        default:
          throw new Error(`Unknown tool: ${name}`);
      }

      return {
        content: [{
          type: 'text',
          text: JSON.stringify(result, null, 2),
        }],
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error(`Tool ${name} failed: ${message}`);
      return {
        content: [{ type: 'text', text: `Error: ${message}` }],
        isError: true,
      };
    }
  });

  return server;
}
