import { describe, it, expect } from 'vitest';
import { GetAvailableMaterialsArgs, SetMeshMaterialColorArgs, getAvailableMaterials, setMeshMaterialColor, toRgba } from './materials.js';
import { RecordingBridge } from '../testing/recordingBridge.js';
import type { CommandResponse } from '../connection/types.js';

describe('material tools', () => {
  describe('toRgba', () => {
    it('should add an opaque alpha to RGB', () => {
      expect(toRgba([0.2, 0.4, 0.6])).toEqual([0.2, 0.4, 0.6, 1]);
    });

    it('should clamp every channel to 0..1', () => {
      expect(toRgba([1.5, -0.2, 0.5, 2])).toEqual([1, 0, 0.5, 1]);
    });
  });

  it('should search /Game/ including engine materials by default', async () => {
    const bridge = new RecordingBridge();

    await getAvailableMaterials(bridge, GetAvailableMaterialsArgs.parse({}));

    expect(bridge.sent).toEqual([
      { name: 'get_available_materials', params: { search_path: '/Game/', include_engine_materials: true } },
    ]);
  });

  describe('setMeshMaterialColor', () => {
    const args = SetMeshMaterialColorArgs.parse({
      blueprint_name: 'Crate_BP',
      component_name: 'Mesh',
      color: [1, 0, 0],
    });

    it('should write both the BaseColor and Color parameters', async () => {
      const bridge = new RecordingBridge();

      const result = await setMeshMaterialColor(bridge, args);

      expect(bridge.sent.map(command => command.params.parameter_name)).toEqual(['BaseColor', 'Color']);
      expect(bridge.sent[0]).toEqual({
        name: 'set_mesh_material_color',
        params: {
          blueprint_name: 'Crate_BP',
          component_name: 'Mesh',
          color: [1, 0, 0, 1],
          material_path: '/Engine/BasicShapes/BasicShapeMaterial',
          parameter_name: 'BaseColor',
          material_slot: 0,
        },
      });
      expect(result.success).toBe(true);
      expect(result.message).toBe('Color applied successfully to slot 0: [1, 0, 0, 1]');
    });

    it('should succeed when only one parameter exists', async () => {
      const bridge = new RecordingBridge().on('set_mesh_material_color', (params): CommandResponse =>
        params.parameter_name === 'BaseColor' ? { status: 'error', error: 'No parameter BaseColor' } : { status: 'success' }
      );

      const result = await setMeshMaterialColor(bridge, args);

      expect(result.success).toBe(true);
      expect(result.results.BaseColor).toEqual({ status: 'error', error: 'No parameter BaseColor' });
    });

    it('should fail when neither parameter can be set', async () => {
      const bridge = new RecordingBridge().fail('set_mesh_material_color', 'Component not found');

      const result = await setMeshMaterialColor(bridge, args);

      expect(result.success).toBe(false);
      expect(result.message).toBe('Failed to set color parameters on slot 0');
    });
  });
});
