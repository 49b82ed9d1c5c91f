import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MemoryHost } from '../host/MemoryHost';
import type { RecordedPrimitive } from '../host/MemoryHost';
import { ProgressIndicatorController } from './ProgressIndicatorController';
import { INVALID_TIMESTEP_MESSAGE, NO_FRAMES_MESSAGE } from './IndicatorState';

function texts(primitives: RecordedPrimitive[]): string[] {
  return primitives.flatMap((p) => (p.kind === 'text' ? [p.text] : []));
}

describe('ProgressIndicatorController', () => {
  let host: MemoryHost;

  beforeEach(() => {
    host = new MemoryHost({ totalFrames: 101, currentFrame: 50 });
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts disabled without touching the host', () => {
    const controller = new ProgressIndicatorController(host);

    expect(controller.isEnabled()).toBe(false);
    expect(host.getDrawables()).toHaveLength(0);
    expect(host.getFrameListenerCount()).toBe(0);
  });

  it('draws immediately when toggled on', () => {
    const controller = new ProgressIndicatorController(host, { config: { header: 'Hello world' } });
    controller.toggle(true);

    const [drawable] = host.getDrawables();
    expect(controller.isEnabled()).toBe(true);
    expect(controller.getConfig().enabled).toBe(true);
    expect(drawable.getPrimitives()).toHaveLength(8);
    expect(texts(drawable.getPrimitives())).toEqual(['Time: 0.05 / 0.10 ps', 'Hello world']);
    expect(controller.getRenderState()).toEqual({
      percentage: 0.5,
      timeLabel: 'Time: 0.05 / 0.10 ps',
      errorMessage: '',
      errorType: null,
      foregroundColor: 'white',
    });
  });

  it('enables from the constructor when the initial config asks for it', () => {
    const controller = new ProgressIndicatorController(host, { config: { enabled: true } });

    expect(controller.isEnabled()).toBe(true);
    expect(host.getDrawables()[0].getPrimitives()).toHaveLength(8);
  });

  it('ignores a second enable', () => {
    const controller = new ProgressIndicatorController(host);

    expect(controller.enable()).toBe(true);
    expect(controller.enable()).toBe(false);
    controller.toggle(true);

    expect(host.getDrawables()).toHaveLength(1);
    expect(host.getFrameListenerCount()).toBe(1);
    expect(host.getViewListenerCount()).toBe(1);
    expect(host.getQuitListenerCount()).toBe(1);
  });

  it('redraws once per host frame change', () => {
    const controller = new ProgressIndicatorController(host);
    controller.toggle(true);
    const [drawable] = host.getDrawables();
    const clearsBefore = drawable.getClearCount();

    host.setFrame(100);

    expect(drawable.getClearCount()).toBe(clearsBefore + 1);
    expect(controller.getRenderState().percentage).toBe(1);
    expect(texts(drawable.getPrimitives())[0]).toBe('Time: 0.10 / 0.10 ps');
  });

  it('follows viewport changes without a frame change', () => {
    const controller = new ProgressIndicatorController(host);
    controller.toggle(true);
    const [drawable] = host.getDrawables();
    const clearsBefore = drawable.getClearCount();

    host.setViewport({ pixelWidth: 1200, scaleFactor: 2, projection: 'orthographic' });

    const layout = controller.getSnapshot().layout;
    expect(drawable.getClearCount()).toBe(clearsBefore + 1);
    expect(layout?.displayHeight).toBe(75);
    expect(layout?.displayWidth).toBe(150);
    expect(layout?.front).toBeCloseTo(0.7495, 10);

    const [first] = drawable.getPrimitives();
    expect(first).toEqual({
      kind: 'triangle',
      color: 'gray',
      points: [
        { x: layout?.outer.left, y: layout?.outer.top, z: layout?.outer.z },
        { x: layout?.outer.right, y: layout?.outer.top, z: layout?.outer.z },
        { x: layout?.outer.left, y: layout?.outer.bottom, z: layout?.outer.z },
      ],
    });
    expect(layout?.outer.left).toBeCloseTo(-142.5, 10);
  });

  it('redraws when header, unit or timestep change', () => {
    const controller = new ProgressIndicatorController(host);
    controller.toggle(true);
    const [drawable] = host.getDrawables();

    controller.setHeader('Temperature: 1000 K');
    expect(texts(drawable.getPrimitives())).toEqual(['Time: 0.05 / 0.10 ps', 'Temperature: 1000 K']);

    controller.setUnit('ns');
    expect(texts(drawable.getPrimitives())[0]).toBe('Time: 0.05 / 0.10 ns');

    controller.setTimestep(2);
    expect(texts(drawable.getPrimitives())[0]).toBe('Time: 100.00 / 200.00 ns');
  });

  it('draws nothing and reports an error when the trajectory has no frames', () => {
    host.setTotalFrames(0);
    const controller = new ProgressIndicatorController(host);
    controller.toggle(true);

    expect(host.getDrawables()[0].getPrimitives()).toEqual([]);
    expect(controller.getRenderState().errorMessage).toBe(NO_FRAMES_MESSAGE);
  });

  it('hides the overlay for a negative timestep and recovers once it is fixed', () => {
    const controller = new ProgressIndicatorController(host);
    controller.toggle(true);
    const [drawable] = host.getDrawables();

    controller.setTimestep(-1);
    expect(drawable.getPrimitives()).toEqual([]);
    expect(controller.getRenderState().errorMessage).toBe(INVALID_TIMESTEP_MESSAGE);
    expect(controller.getConfig().timestep).toBe(-1);

    controller.setTimestep(0.001);
    expect(drawable.getPrimitives()).toHaveLength(8);
    expect(controller.getRenderState().errorMessage).toBe('');
  });

  it('unsubscribes and destroys the drawable when toggled off', () => {
    const controller = new ProgressIndicatorController(host);
    controller.toggle(true);
    const [drawable] = host.getDrawables();

    controller.toggle(false);
    host.setFrame(10);

    expect(controller.isEnabled()).toBe(false);
    expect(controller.getConfig().enabled).toBe(false);
    expect(host.getDrawables()).toHaveLength(0);
    expect(host.getFrameListenerCount()).toBe(0);
    expect(host.getViewListenerCount()).toBe(0);
    expect(host.getQuitListenerCount()).toBe(0);
    expect(drawable.getClearCount()).toBe(1);
  });

  it('stops listening but leaves the drawable alone when the host quits', () => {
    const controller = new ProgressIndicatorController(host);
    controller.toggle(true);

    host.requestQuit();

    expect(console.info).toHaveBeenCalledWith('[ProgressIndicator] Got host quit event');
    expect(controller.isEnabled()).toBe(false);
    expect(host.getDrawables()).toHaveLength(1);
    expect(host.getFrameListenerCount()).toBe(0);
    expect(host.getViewListenerCount()).toBe(0);
    expect(host.getQuitListenerCount()).toBe(0);
  });

  it('does not redraw on configuration changes while disabled', () => {
    const controller = new ProgressIndicatorController(host);
    controller.toggle(true);
    controller.toggle(false);

    controller.setHeader('changed');

    expect(controller.getConfig().header).toBe('changed');
    expect(host.getDrawables()).toHaveLength(0);
  });

  it('samples the background once per enable or reset', () => {
    host.setBackground({ color: [1, 1, 1] });
    const controller = new ProgressIndicatorController(host);
    controller.toggle(true);
    expect(controller.getRenderState().foregroundColor).toBe('black');

    host.setBackground({ color: [0.1, 0.1, 0.1] });
    host.setFrame(20);
    expect(controller.getRenderState().foregroundColor).toBe('black');

    controller.resetColors();
    expect(controller.getRenderState().foregroundColor).toBe('white');
  });

  it('samples the bottom color of a gradient background', () => {
    host.setBackground({ color: [1, 1, 1], gradientBottom: [0, 0, 0.2] });
    const controller = new ProgressIndicatorController(host);
    controller.toggle(true);

    const textColors = host
      .getDrawables()[0]
      .getPrimitives()
      .flatMap((p) => (p.kind === 'text' ? [p.color] : []));
    expect(textColors).toEqual(['white', 'white']);
  });

  it('notifies subscribers with snapshots', () => {
    const controller = new ProgressIndicatorController(host);
    const listener = vi.fn();
    controller.subscribe(listener);

    controller.setHeader('before');
    expect(listener).toHaveBeenLastCalledWith(
      expect.objectContaining({ enabled: false, layout: null }),
    );

    controller.toggle(true);
    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener.mock.calls[1][0].enabled).toBe(true);
    expect(listener.mock.calls[1][0].renderState.percentage).toBe(0.5);
    expect(listener.mock.calls[1][0].layout?.displayWidth).toBe(200);

    controller.toggle(false);
    expect(listener).toHaveBeenCalledTimes(3);
    expect(listener.mock.calls[2][0].enabled).toBe(false);
  });

  it('logs render errors only in debug mode', () => {
    host.setTotalFrames(0);
    new ProgressIndicatorController(host, { config: { enabled: true } });
    expect(console.debug).not.toHaveBeenCalled();

    new ProgressIndicatorController(host, { config: { enabled: true }, debug: true });
    expect(console.debug).toHaveBeenCalledWith(`[ProgressIndicator] ${NO_FRAMES_MESSAGE}`);
  });

  it('releases everything on dispose', () => {
    const controller = new ProgressIndicatorController(host);
    const listener = vi.fn();
    controller.subscribe(listener);
    controller.toggle(true);
    listener.mockClear();

    controller.dispose();
    controller.setHeader('after dispose');

    expect(host.getDrawables()).toHaveLength(0);
    expect(listener).not.toHaveBeenCalled();
  });
});
