/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { debugLogger } from './debugLogger.js';

describe('DebugLogger', () => {
  afterEach(() => {
    debugLogger.setDebugMode(false);
    vi.restoreAllMocks();
  });

  it('should call console.log with the correct arguments', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    debugLogger.log('loaded', { lines: 3 });
    expect(spy).toHaveBeenCalledWith('loaded', { lines: 3 });
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('should call console.warn with the correct arguments', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    debugLogger.warn('line truncated', 255);
    expect(spy).toHaveBeenCalledWith('line truncated', 255);
  });

  it('should call console.error with the correct arguments', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const error = new Error('disk full');
    debugLogger.error('save failed', error);
    expect(spy).toHaveBeenCalledWith('save failed', error);
  });

  it('should keep debug output off the console until debug mode is on', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    debugLogger.debug('hidden');
    expect(spy).not.toHaveBeenCalled();

    debugLogger.setDebugMode(true);
    debugLogger.debug('shown', 1);
    expect(spy).toHaveBeenCalledWith('shown', 1);
    expect(spy).toHaveBeenCalledTimes(1);
  });
});
