// ═══════════════════════════════════════════════════════════════════════════
// Blueprint Tool Tests
// ═══════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  AddComponentToBlueprintArgs,
  GetBlueprintVariableDetailsArgs,
  SetPhysicsPropertiesArgs,
  SpawnPhysicsBlueprintActorArgs,
  addComponentToBlueprint,
  getBlueprintVariableDetails,
  setPhysicsProperties,
  spawnPhysicsBlueprintActor,
} from './blueprints.js';
import { RecordingBridge } from '../testing/recordingBridge.js';

describe('blueprint tools', () => {
  it('should send empty transforms and properties by default when adding a component', async () => {
    const bridge = new RecordingBridge();

    await addComponentToBlueprint(bridge, AddComponentToBlueprintArgs.parse({
      blueprint_name: 'Door_BP',
      component_type: 'StaticMeshComponent',
      component_name: 'Frame',
    }));

    expect(bridge.sent[0]).toEqual({
      name: 'add_component_to_blueprint',
      params: {
        blueprint_name: 'Door_BP',
        component_type: 'StaticMeshComponent',
        component_name: 'Frame',
        location: [],
        rotation: [],
        scale: [],
        component_properties: {},
      },
    });
  });

  it('should apply the physics defaults', async () => {
    const bridge = new RecordingBridge();

    await setPhysicsProperties(bridge, SetPhysicsPropertiesArgs.parse({ blueprint_name: 'Ball_BP', component_name: 'Mesh' }));

    expect(bridge.sent[0].params).toEqual({
      blueprint_name: 'Ball_BP',
      component_name: 'Mesh',
      simulate_physics: true,
      gravity_enabled: true,
      mass: 1,
      linear_damping: 0.01,
      angular_damping: 0,
    });
  });

  it('should ask for every variable when none is named', async () => {
    const bridge = new RecordingBridge();

    await getBlueprintVariableDetails(bridge, GetBlueprintVariableDetailsArgs.parse({ blueprint_path: '/Game/Door_BP' }));

    expect(bridge.sent[0].params).toEqual({ blueprint_path: '/Game/Door_BP', variable_name: null });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // spawn_physics_blueprint_actor
  // ─────────────────────────────────────────────────────────────────────────

  describe('spawnPhysicsBlueprintActor', () => {
    it('should build, compile, spawn and scale in order', async () => {
      const bridge = new RecordingBridge().on('spawn_blueprint_actor', () => ({
        status: 'success',
        result: { name: 'Ball_2' },
      }));

      const response = await spawnPhysicsBlueprintActor(bridge, SpawnPhysicsBlueprintActorArgs.parse({
        name: 'Ball',
        location: [0, 0, 500],
        scale: [0.5, 0.5, 0.5],
      }));

      expect(response).toEqual({ status: 'success', result: { name: 'Ball_2' } });
      expect(bridge.names()).toEqual([
        'create_blueprint',
        'add_component_to_blueprint',
        'set_static_mesh_properties',
        'set_physics_properties',
        'compile_blueprint',
        'spawn_blueprint_actor',
        'set_actor_transform',
      ]);
      expect(bridge.sent[0].params).toEqual({ name: 'Ball_BP', parent_class: 'Actor' });
      expect(bridge.sent[5].params).toEqual({
        blueprint_name: 'Ball_BP',
        actor_name: 'Ball',
        location: [0, 0, 500],
        rotation: [0, 0, 0],
      });
      expect(bridge.sent[6].params).toEqual({ name: 'Ball_2', scale: [0.5, 0.5, 0.5] });
    });

    it('should color the mesh before compiling when a color is given', async () => {
      const bridge = new RecordingBridge();

      await spawnPhysicsBlueprintActor(bridge, SpawnPhysicsBlueprintActorArgs.parse({ name: 'Ball', color: [0, 1, 0] }));

      expect(bridge.names().slice(4, 7)).toEqual(['set_mesh_material_color', 'set_mesh_material_color', 'compile_blueprint']);
    });

    it('should stop at the first failing step', async () => {
      const bridge = new RecordingBridge().fail('set_static_mesh_properties', 'Mesh not found');

      const response = await spawnPhysicsBlueprintActor(bridge, SpawnPhysicsBlueprintActorArgs.parse({
        name: 'Ball',
        mesh_path: '/Game/Missing.Missing',
      }));

      expect(response).toEqual({ status: 'error', error: 'set_static_mesh_properties failed for Ball_BP: Mesh not found' });
      expect(bridge.names()).toEqual(['create_blueprint', 'add_component_to_blueprint', 'set_static_mesh_properties']);
    });

    it('should skip scaling when the spawn fails', async () => {
      const bridge = new RecordingBridge().fail('spawn_blueprint_actor', 'Actor name already exists');

      const response = await spawnPhysicsBlueprintActor(bridge, SpawnPhysicsBlueprintActorArgs.parse({ name: 'Ball' }));

      expect(response).toEqual({ status: 'error', error: 'Actor name already exists' });
      expect(bridge.names()).not.toContain('set_actor_transform');
    });
  });
});
