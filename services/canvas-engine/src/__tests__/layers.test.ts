import type { CanvasObject } from '../../../../shared/types/canvas';
import { makePoint } from '../../../../shared/types/stroke';
import type { Stroke } from '../../../../shared/types/stroke';
import { LayerCompositor } from '../layers';
import { CanvasModel } from '../model';

function stroke(id: string, layerId: string, completed = true): Stroke {
  return { id, tool: 'pen', color: 0xff000000, size: 2, layerId, points: [makePoint(0, 0)], completed };
}

function ellipse(id: string, layerId: string): CanvasObject {
  return {
    id,
    type: 'ellipse',
    layerId,
    x: 0,
    y: 0,
    width: 20,
    height: 10,
    rotation: 0,
    color: 0xff000000,
    strokeWidth: 1,
    filled: true,
  };
}

describe('LayerCompositor', () => {
  let model: CanvasModel;
  let layers: LayerCompositor;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    let n = 0;
    model = new CanvasModel();
    layers = new LayerCompositor(model, () => `layer-${++n}`);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('adds layers on top and makes them active', () => {
    const added = layers.addLayer();
    expect(added).toEqual({
      id: 'layer-1',
      name: 'Layer 2',
      visible: true,
      locked: false,
      opacity: 1,
      zIndex: 1,
    });
    expect(layers.activeLayerId).toBe('layer-1');
    expect(layers.orderedLayers().map((l) => l.id)).toEqual(['layer-1', 'default']);
  });

  it('refuses to delete the last layer', () => {
    expect(layers.deleteLayer('default')).toBe(false);
    expect(model.layerCount).toBe(1);
  });

  it('refuses to delete a layer that does not exist', () => {
    layers.addLayer();
    expect(layers.deleteLayer('nope')).toBe(false);
  });

  it('deletes exactly the items on the layer and reassigns the active layer', () => {
    layers.addLayer();
    model.addStroke(stroke('s1', 'layer-1'));
    model.addStroke(stroke('s2', 'layer-1'));
    model.addObject(ellipse('o1', 'layer-1'));
    model.addStroke(stroke('keep', 'default'));

    expect(layers.deleteLayer('layer-1')).toBe(true);
    expect(model.listStrokes().map((s) => s.id)).toEqual(['keep']);
    expect(model.listObjects()).toEqual([]);
    expect(layers.activeLayerId).toBe('default');
  });

  it('keeps the active layer when another one is deleted', () => {
    layers.addLayer();
    layers.addLayer();
    expect(layers.deleteLayer('layer-1')).toBe(true);
    expect(layers.activeLayerId).toBe('layer-2');
  });

  it('reorders in display order and rewrites zIndex densely', () => {
    layers.addLayer();
    layers.addLayer();
    expect(layers.orderedLayers().map((l) => l.id)).toEqual(['layer-2', 'layer-1', 'default']);

    expect(layers.reorder(0, 2)).toBe(true);
    expect(layers.orderedLayers().map((l) => [l.id, l.zIndex])).toEqual([
      ['layer-1', 2],
      ['default', 1],
      ['layer-2', 0],
    ]);
  });

  it('rejects out-of-range reorder indices', () => {
    layers.addLayer();
    expect(layers.reorder(5, 0)).toBe(false);
    expect(layers.reorder(0, -1)).toBe(false);
  });

  it('clamps opacity and patches layer properties', () => {
    expect(layers.setOpacity('default', 2)).toBe(true);
    expect(layers.opacityOf('default')).toBe(1);
    layers.setOpacity('default', -1);
    expect(layers.opacityOf('default')).toBe(0);

    layers.rename('default', 'Background');
    layers.setLocked('default', true);
    expect(layers.activeLayer()).toMatchObject({ name: 'Background', locked: true });
    expect(layers.setVisibility('missing', false)).toBe(false);
  });

  it('reports full opacity for unknown layer ids', () => {
    expect(layers.opacityOf('gone')).toBe(1);
  });

  it('only switches to layers that exist', () => {
    layers.addLayer();
    expect(layers.setActiveLayer('default')).toBe(true);
    expect(layers.setActiveLayer('missing')).toBe(false);
    expect(layers.activeLayerId).toBe('default');
  });

  it('filters items on hidden layers', () => {
    layers.addLayer();
    layers.setVisibility('layer-1', false);
    const visible = layers.filterForRender(
      [stroke('a', 'default'), stroke('b', 'layer-1')],
      [ellipse('o1', 'layer-1')]
    );
    expect(visible.strokes.map((s) => s.id)).toEqual(['a']);
    expect(visible.objects).toEqual([]);
  });

  it('composes visible layers bottom first with pending and live strokes', () => {
    layers.addLayer();
    model.addStroke(stroke('s1', 'default'));
    model.beginPendingStroke(stroke('p1', 'layer-1', false));

    const scene = layers.composeScene({ strokes: [stroke('live', 'layer-1', false)] });
    expect(scene.map((s) => s.layer.id)).toEqual(['default', 'layer-1']);
    expect(scene[0].strokes.map((s) => s.id)).toEqual(['s1']);
    expect(scene[1].strokes.map((s) => s.id)).toEqual(['p1', 'live']);

    layers.setVisibility('default', false);
    expect(layers.composeScene().map((s) => s.layer.id)).toEqual(['layer-1']);
  });
});
