import { describe, it, expect } from 'vitest';
import { MemoryDrawable } from '../host/MemoryHost';
import { OverlayRenderer, drawRectangle } from './OverlayRenderer';
import { computeOverlayLayout } from './layout';
import type { RenderState } from './types';

const layout = computeOverlayLayout(
  { pixelWidth: 800, pixelHeight: 600, scaleFactor: 1, nearClip: 0.5, projection: 'perspective' },
  0.5,
);

const okState: RenderState = {
  percentage: 0.5,
  timeLabel: 'Time: 0.05 / 0.10 ps',
  errorMessage: '',
  errorType: null,
  foregroundColor: 'black',
};

describe('drawRectangle', () => {
  it('splits a rectangle into two triangles sharing the top-right corner', () => {
    const drawable = new MemoryDrawable(1);
    drawRectangle(drawable, { left: -2, top: 1, right: 2, bottom: -1, z: 0.5 });

    expect(drawable.getPrimitives()).toEqual([
      {
        kind: 'triangle',
        color: 'white',
        points: [
          { x: -2, y: 1, z: 0.5 },
          { x: 2, y: 1, z: 0.5 },
          { x: -2, y: -1, z: 0.5 },
        ],
      },
      {
        kind: 'triangle',
        color: 'white',
        points: [
          { x: -2, y: -1, z: 0.5 },
          { x: 2, y: 1, z: 0.5 },
          { x: 2, y: -1, z: 0.5 },
        ],
      },
    ]);
  });
});

describe('OverlayRenderer', () => {
  it('draws outer, inner and fill boxes followed by the two labels', () => {
    const drawable = new MemoryDrawable(1);
    const renderer = new OverlayRenderer(drawable);

    expect(renderer.render({ layout, state: okState, header: 'Hello world' })).toBe(true);

    const primitives = drawable.getPrimitives();
    expect(primitives.map((p) => `${p.kind}:${p.color}`)).toEqual([
      'triangle:gray',
      'triangle:gray',
      'triangle:white',
      'triangle:white',
      'triangle:silver',
      'triangle:silver',
      'text:black',
      'text:black',
    ]);

    const [outerFirst, , innerFirst, , fillFirst, fillSecond, timeText, headerText] = primitives;
    expect(outerFirst).toMatchObject({
      points: [
        { x: layout.outer.left, y: layout.outer.top, z: layout.outer.z },
        { x: layout.outer.right, y: layout.outer.top, z: layout.outer.z },
        { x: layout.outer.left, y: layout.outer.bottom, z: layout.outer.z },
      ],
    });
    expect(innerFirst).toMatchObject({
      points: [
        { x: layout.inner.left, y: layout.inner.top, z: layout.inner.z },
        { x: layout.inner.right, y: layout.inner.top, z: layout.inner.z },
        { x: layout.inner.left, y: layout.inner.bottom, z: layout.inner.z },
      ],
    });
    expect(fillFirst).toMatchObject({
      points: [
        { x: layout.fill.left, y: layout.fill.top, z: layout.fill.z },
        { x: layout.fill.right, y: layout.fill.top, z: layout.fill.z },
        { x: layout.fill.left, y: layout.fill.bottom, z: layout.fill.z },
      ],
    });
    expect(fillSecond).toMatchObject({
      points: [
        { x: layout.fill.left, y: layout.fill.bottom, z: layout.fill.z },
        { x: layout.fill.right, y: layout.fill.top, z: layout.fill.z },
        { x: layout.fill.right, y: layout.fill.bottom, z: layout.fill.z },
      ],
    });
    expect(timeText).toEqual({
      kind: 'text',
      color: 'black',
      position: layout.timeLabel.position,
      text: 'Time: 0.05 / 0.10 ps',
      size: 2,
    });
    expect(headerText).toEqual({
      kind: 'text',
      color: 'black',
      position: layout.header.position,
      text: 'Hello world',
      size: 1,
    });
  });

  it('clears the previous frame before drawing', () => {
    const drawable = new MemoryDrawable(1);
    const renderer = new OverlayRenderer(drawable);

    renderer.render({ layout, state: okState, header: '' });
    renderer.render({ layout, state: okState, header: '' });

    expect(drawable.getPrimitives()).toHaveLength(8);
    expect(drawable.getClearCount()).toBe(2);
  });

  it('leaves the drawable empty when the state carries an error', () => {
    const drawable = new MemoryDrawable(1);
    const renderer = new OverlayRenderer(drawable);
    renderer.render({ layout, state: okState, header: '' });

    const drawn = renderer.render({
      layout,
      state: { ...okState, errorMessage: 'Error: top molecule has no frames', errorType: 'UNRENDERABLE_STATE' },
      header: 'ignored',
    });

    expect(drawn).toBe(false);
    expect(drawable.getPrimitives()).toEqual([]);
  });
});
