import type { CanvasIntents } from '../../../../shared/types/events';
import { EditEngine } from '../edit-engine';
import type { TextPrompt } from '../edit-engine';
import { HistoryManager } from '../history';
import { LayerCompositor } from '../layers';
import { CanvasModel } from '../model';

function mockIntents(): jest.Mocked<CanvasIntents> {
  return {
    strokeStart: jest.fn(),
    strokeUpdate: jest.fn(),
    strokeEnd: jest.fn(),
    cursorMove: jest.fn(),
    objectAdd: jest.fn(),
    objectUpdate: jest.fn(),
    objectDelete: jest.fn(),
    clearBoard: jest.fn(),
  };
}

function setup(textPrompt?: TextPrompt) {
  let n = 0;
  const newId = () => `id-${++n}`;
  const model = new CanvasModel();
  const layers = new LayerCompositor(model, newId);
  const history = new HistoryManager();
  const intents = mockIntents();
  const engine = new EditEngine({ model, layers, history, intents, textPrompt, userId: 'u1', newId, now: () => 1000 });
  return { model, layers, history, intents, engine };
}

function drawRect(engine: EditEngine): void {
  engine.setTool('rectangle');
  engine.pointerDown({ x: 0, y: 0 });
  engine.pointerMove({ x: 40, y: 30 });
  engine.pointerUp();
}

describe('EditEngine', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('pen strokes', () => {
    it('records a stroke and streams it to peers', () => {
      const { model, history, intents, engine } = setup();
      engine.pointerDown({ x: 10, y: 10 });
      engine.pointerMove({ x: 20, y: 20 });
      engine.pointerMove({ x: 30, y: 30 });
      engine.pointerUp();

      const [stroke] = model.listStrokes();
      expect(stroke.points.map((p) => [p.x, p.y])).toEqual([
        [10, 10],
        [20, 20],
        [30, 30],
      ]);
      expect(stroke.completed).toBe(true);
      expect(history.undoCount).toBe(1);
      expect(intents.strokeStart).toHaveBeenCalledTimes(1);
      expect(intents.strokeUpdate).toHaveBeenCalledTimes(2);
      expect(intents.cursorMove).toHaveBeenCalledTimes(2);
      expect(intents.strokeEnd).toHaveBeenCalledWith('id-1');
    });

    it('shows the stroke in progress in the scene', () => {
      const { model, engine } = setup();
      engine.pointerDown({ x: 1, y: 1 });
      expect(model.listStrokes()).toEqual([]);
      expect(engine.composeScene()[0].strokes.map((s) => s.id)).toEqual(['id-1']);
    });

    it('undoes and redoes locally without emitting anything', () => {
      const { model, intents, engine } = setup();
      engine.pointerDown({ x: 10, y: 10 });
      engine.pointerUp();
      jest.clearAllMocks();

      expect(engine.undo()?.type).toBe('add_stroke');
      expect(model.listStrokes()).toEqual([]);
      expect(engine.redo()?.type).toBe('add_stroke');
      expect(model.listStrokes()).toHaveLength(1);
      for (const intent of Object.values(intents)) {
        expect(intent).not.toHaveBeenCalled();
      }
    });

    it('ignores drawing on a locked layer', () => {
      const { layers, model, intents, engine } = setup();
      layers.setLocked('default', true);
      engine.pointerDown({ x: 10, y: 10 });
      engine.pointerUp();
      expect(model.listStrokes()).toEqual([]);
      expect(intents.strokeStart).not.toHaveBeenCalled();
    });

    it('drops a stroke whose layer was deleted mid-draw', () => {
      const { layers, model, history, intents, engine } = setup();
      layers.addLayer();
      engine.pointerDown({ x: 10, y: 10 });
      expect(layers.deleteLayer('id-1')).toBe(true);
      engine.pointerUp();

      expect(model.listStrokes()).toEqual([]);
      expect(history.undoCount).toBe(0);
      expect(intents.strokeStart).toHaveBeenCalledTimes(1);
      expect(intents.strokeEnd).not.toHaveBeenCalled();
    });

    it('finalizes the next stroke after a dropped one', () => {
      const { layers, intents, engine } = setup();
      layers.addLayer();
      engine.pointerDown({ x: 10, y: 10 });
      layers.deleteLayer('id-1');
      engine.pointerUp();

      engine.pointerDown({ x: 20, y: 20 });
      engine.pointerUp();
      expect(intents.strokeEnd).toHaveBeenCalledTimes(1);
      expect(intents.strokeEnd).toHaveBeenCalledWith('id-3');
    });
  });

  describe('eraser', () => {
    it('deletes hit strokes with one history entry each', () => {
      const { model, history, engine } = setup();
      engine.pointerDown({ x: 10, y: 10 });
      engine.pointerUp();

      engine.setTool('eraser');
      engine.setStrokeSize(4);
      engine.pointerDown({ x: 12, y: 10 });
      engine.pointerUp();
      expect(model.listStrokes()).toEqual([]);
      expect(history.undoCount).toBe(2);

      engine.undo();
      expect(model.listStrokes()).toHaveLength(1);
    });
  });

  describe('objects', () => {
    it('commits a shape and announces it', () => {
      const { model, history, intents, engine } = setup();
      drawRect(engine);

      expect(model.listObjects()).toHaveLength(1);
      expect(history.undoCount).toBe(1);
      expect(intents.objectAdd).toHaveBeenCalledWith(
        expect.objectContaining({ id: 'id-1', type: 'rectangle', x: 0, y: 0, width: 40, height: 30 })
      );
    });

    it('adds text from the prompt', () => {
      const prompt = jest.fn<string | null, [{ x: number; y: number }]>(() => 'hello');
      const { model, intents, engine } = setup(prompt);
      engine.setTool('text');
      engine.pointerDown({ x: 5, y: 6 });

      expect(prompt).toHaveBeenCalledWith({ x: 5, y: 6 });
      expect(model.listObjects()).toEqual([expect.objectContaining({ type: 'text', text: 'hello', fontSize: 8 })]);
      expect(intents.objectAdd).toHaveBeenCalledTimes(1);
    });

    it('adds nothing when the prompt is cancelled', () => {
      const { model, history, engine } = setup(() => null);
      engine.setTool('text');
      engine.pointerDown({ x: 5, y: 6 });
      expect(model.listObjects()).toEqual([]);
      expect(history.undoCount).toBe(0);
    });

    it('sends one update with the final position after a drag', () => {
      const { model, history, intents, engine } = setup();
      drawRect(engine);
      engine.setTool('select');
      engine.pointerDown({ x: 10, y: 10 });
      engine.pointerMove({ x: 20, y: 20 });
      engine.pointerMove({ x: 25, y: 30 });
      engine.pointerUp();

      expect(model.getObject('id-1')).toMatchObject({ x: 15, y: 20 });
      expect(intents.objectUpdate).toHaveBeenCalledTimes(1);
      expect(intents.objectUpdate).toHaveBeenCalledWith('id-1', { x: 15, y: 20 });
      expect(history.undoCount).toBe(1);
    });

    it('deletes the selected object', () => {
      const { model, intents, engine } = setup();
      expect(engine.deleteSelectedObject()).toBe(false);

      drawRect(engine);
      engine.setTool('select');
      engine.pointerDown({ x: 10, y: 10 });
      engine.pointerUp();
      expect(engine.selectedObject?.id).toBe('id-1');

      expect(engine.deleteSelectedObject()).toBe(true);
      expect(model.listObjects()).toEqual([]);
      expect(engine.selectedObject).toBeUndefined();
      expect(intents.objectDelete).toHaveBeenCalledWith('id-1');

      engine.undo();
      expect(model.getObject('id-1')).toBeDefined();
    });

    it('updates the selected object reversibly', () => {
      const { model, intents, engine } = setup();
      drawRect(engine);
      engine.setTool('select');
      engine.pointerDown({ x: 10, y: 10 });
      engine.pointerUp();

      expect(engine.updateSelectedObject({ color: 0xff00ff00 })).toBe(true);
      expect(model.getObject('id-1')?.color).toBe(0xff00ff00);
      expect(intents.objectUpdate).toHaveBeenCalledWith('id-1', { color: 0xff00ff00 });

      engine.undo();
      expect(model.getObject('id-1')?.color).toBe(0xff000000);
    });

    it('forgets the selection when the tool changes', () => {
      const { engine } = setup();
      drawRect(engine);
      engine.setTool('select');
      engine.pointerDown({ x: 10, y: 10 });
      engine.pointerUp();
      engine.setTool('pen');
      expect(engine.selectedObject).toBeUndefined();
    });
  });

  describe('clear canvas', () => {
    it('clears, announces and can be undone', () => {
      const { model, intents, engine } = setup();
      engine.pointerDown({ x: 10, y: 10 });
      engine.pointerUp();
      drawRect(engine);

      engine.clearCanvas();
      expect(model.listStrokes()).toEqual([]);
      expect(model.listObjects()).toEqual([]);
      expect(intents.clearBoard).toHaveBeenCalledTimes(1);

      engine.undo();
      expect(model.listStrokes()).toHaveLength(1);
      expect(model.listObjects()).toHaveLength(1);
    });
  });

  describe('history edge cases', () => {
    it('treats undo and redo on empty stacks as no-ops', () => {
      const { engine } = setup();
      expect(engine.undo()).toBeUndefined();
      expect(engine.redo()).toBeUndefined();
    });

    it('skips a redo whose layer is gone', () => {
      const { layers, model, engine } = setup();
      layers.addLayer();
      engine.pointerDown({ x: 10, y: 10 });
      engine.pointerUp();
      layers.deleteLayer('id-1');

      engine.undo();
      expect(() => engine.redo()).not.toThrow();
      expect(model.listStrokes()).toEqual([]);
      expect(console.warn).toHaveBeenCalledWith('[EditEngine] Skipped redo of add_stroke: Unknown layer: id-1');
    });
  });

  describe('viewport', () => {
    it('clamps zoom and converts screen points', () => {
      const { engine } = setup();
      engine.setScale(10);
      expect(engine.scale).toBe(5);
      engine.setScale(0.01);
      expect(engine.scale).toBe(0.1);

      engine.setScale(2);
      engine.pan(10, 20);
      expect(engine.panOffset).toEqual({ x: 10, y: 20 });
      expect(engine.screenToCanvas({ x: 30, y: 40 })).toEqual({ x: 10, y: 10 });
    });

    it('ignores non-positive stroke sizes', () => {
      const { engine } = setup();
      engine.setStrokeSize(0);
      expect(engine.strokeSize).toBe(2);
    });
  });
});
