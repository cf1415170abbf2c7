/**
 * Unit Tests - SceneHistory Module
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createSceneHistory, type SceneHistory } from '../../modules/sceneHistory';

describe('SceneHistory', () => {
  let history: SceneHistory;

  const transition = (sceneId: string | null, viewName: string) =>
    history.record({ sceneId, viewName, title: viewName, visitorId: 'visitor-1' });

  beforeEach(() => {
    history = createSceneHistory();
  });

  it('should assign increasing transition ids', () => {
    expect(transition(null, 'home').id).toBe(1);
    expect(transition('scene_1', 'cart').id).toBe(2);
  });

  it('should keep the latest transition per scene', () => {
    transition(null, 'home');
    transition('scene_1', 'cart');
    transition(null, 'settings');

    expect(history.getCurrent(null)?.viewName).toBe('settings');
    expect(history.getCurrent('scene_1')?.viewName).toBe('cart');
    expect(history.getCurrent('scene_2')).toBeNull();
  });

  it('should tell whether a task belongs to the current view', () => {
    const home = transition(null, 'home');

    expect(history.isCurrent({ sceneId: null, transitionId: home.id })).toBe(true);

    transition(null, 'cart');

    expect(history.isCurrent({ sceneId: null, transitionId: home.id })).toBe(false);
  });

  it('should treat tasks in a scene without transitions as current', () => {
    expect(history.isCurrent({ sceneId: 'scene_3', transitionId: null })).toBe(true);
  });

  it('should clear transitions on reset but keep ids increasing', () => {
    transition(null, 'home');
    transition(null, 'cart');
    history.reset();

    expect(history.getCurrent(null)).toBeNull();
    expect(transition(null, 'home').id).toBe(3);
  });

  it('should treat tasks stamped before a reset as stale', () => {
    transition(null, 'home');
    const cart = transition(null, 'cart');
    history.reset();

    expect(history.isCurrent({ sceneId: null, transitionId: cart.id })).toBe(false);
  });

  it('should treat tasks without a transition created before a reset as stale', () => {
    const createdAt = Date.now() - 1000;
    history.reset();

    expect(history.isCurrent({ sceneId: 'scene_3', transitionId: null, createdAt })).toBe(false);
    expect(history.isCurrent({ sceneId: 'scene_3', transitionId: null, createdAt: Date.now() })).toBe(true);
  });
});
