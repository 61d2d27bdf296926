import { describe, it, expect } from 'vitest';
import { SetActorTransformArgs, SpawnActorArgs, findActorsByName, getActorsInLevel, setActorTransform, spawnActor } from './actors.js';
import { ToolArgumentError, parseArgs } from './shared.js';
import { RecordingBridge } from '../testing/recordingBridge.js';

describe('actor tools', () => {
  it('should list actors with no params', async () => {
    const bridge = new RecordingBridge();

    await getActorsInLevel(bridge);

    expect(bridge.sent).toEqual([{ name: 'get_actors_in_level', params: {} }]);
  });

  it('should search by pattern', async () => {
    const bridge = new RecordingBridge();

    await findActorsByName(bridge, { pattern: 'Wall*' });

    expect(bridge.sent).toEqual([{ name: 'find_actors_by_name', params: { pattern: 'Wall*' } }]);
  });

  describe('spawnActor', () => {
    it('should default to a cube static mesh actor at the origin', async () => {
      const bridge = new RecordingBridge();

      await spawnActor(bridge, SpawnActorArgs.parse({ name: 'Crate' }));

      expect(bridge.sent[0]).toEqual({
        name: 'spawn_actor',
        params: {
          name: 'Crate',
          type: 'StaticMeshActor',
          location: [0, 0, 0],
          rotation: [0, 0, 0],
          scale: [1, 1, 1],
          static_mesh: '/Engine/BasicShapes/Cube.Cube',
        },
      });
    });

    it('should not add a mesh to other actor types', async () => {
      const bridge = new RecordingBridge();

      await spawnActor(bridge, SpawnActorArgs.parse({ name: 'Sun', type: 'DirectionalLight' }));

      expect(bridge.sent[0].params).not.toHaveProperty('static_mesh');
    });
  });

  it('should send only the transform parts that were given', async () => {
    const bridge = new RecordingBridge();

    await setActorTransform(bridge, SetActorTransformArgs.parse({ name: 'Crate', scale: [2, 2, 2] }));

    expect(bridge.sent[0]).toEqual({ name: 'set_actor_transform', params: { name: 'Crate', scale: [2, 2, 2] } });
  });

  describe('argument validation', () => {
    it('should name the tool and the bad field', () => {
      expect(() => parseArgs('spawn_actor', SpawnActorArgs, { name: 'Crate', location: [1, 2] })).toThrow(ToolArgumentError);
      expect(() => parseArgs('spawn_actor', SpawnActorArgs, {})).toThrow(/^Invalid arguments for spawn_actor: name: /);
    });

    it('should treat missing arguments as an empty object', () => {
      expect(() => parseArgs('spawn_actor', SpawnActorArgs, undefined)).toThrow(/name: Required/);
    });
  });
});
