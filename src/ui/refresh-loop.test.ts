import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RefreshLoop } from './refresh-loop.js';

describe('RefreshLoop', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('renders once per interval until stopped', () => {
    const renderer = { render: vi.fn() };
    const loop = new RefreshLoop(renderer, 1000);

    loop.start();
    vi.advanceTimersByTime(3500);
    expect(renderer.render).toHaveBeenCalledTimes(3);

    loop.stop();
    vi.advanceTimersByTime(5000);
    expect(renderer.render).toHaveBeenCalledTimes(3);
    expect(loop.isRunning()).toBe(false);
  });

  it('ignores a second start', () => {
    const renderer = { render: vi.fn() };
    const loop = new RefreshLoop(renderer, 1000);

    loop.start();
    loop.start();
    vi.advanceTimersByTime(1000);

    expect(renderer.render).toHaveBeenCalledTimes(1);
    loop.stop();
  });

  it('stops and reports when a frame cannot be drawn', () => {
    const renderer = {
      render: vi.fn(() => {
        throw new Error('EIO: i/o error, read');
      }),
    };
    const reported: string[] = [];
    const loop = new RefreshLoop(renderer, 1000, (message) => reported.push(message));

    loop.start();
    vi.advanceTimersByTime(3000);

    expect(renderer.render).toHaveBeenCalledTimes(1);
    expect(loop.isRunning()).toBe(false);
    expect(reported).toEqual(['⚠ Live summary stopped: EIO: i/o error, read']);
  });

  it('draws immediate frames through the same guard', () => {
    const renderer = {
      render: vi.fn(() => {
        throw new Error('EPIPE: broken pipe, write');
      }),
    };
    const reported: string[] = [];
    const loop = new RefreshLoop(renderer, 1000, (message) => reported.push(message));

    expect(() => loop.renderNow()).not.toThrow();
    loop.renderNow();
    loop.start();
    vi.advanceTimersByTime(3000);

    expect(renderer.render).toHaveBeenCalledTimes(1);
    expect(loop.isRunning()).toBe(false);
    expect(reported).toEqual(['⚠ Live summary stopped: EPIPE: broken pipe, write']);
  });

  it('renders on demand while running', () => {
    const renderer = { render: vi.fn() };
    const loop = new RefreshLoop(renderer, 1000);

    loop.start();
    loop.renderNow();
    vi.advanceTimersByTime(1000);

    expect(renderer.render).toHaveBeenCalledTimes(2);
    loop.stop();
  });
});
