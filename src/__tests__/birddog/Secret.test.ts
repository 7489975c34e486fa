/**
 * Secret Tests
 */

import { describe, it, expect } from '@jest/globals';
import { inspect } from 'node:util';
import { BirdDogArgumentError, Secret } from '../../integrations/birddog/index.js';

describe('Secret', () => {
  it('should reveal the stored value', () => {
    expect(Secret.from('test-password').reveal()).toBe('test-password');
  });

  it('should refuse to reveal after dispose', () => {
    const secret = Secret.from('test-password');
    secret.dispose();

    expect(secret.isDisposed).toBe(true);
    expect(() => secret.reveal()).toThrow(BirdDogArgumentError);
  });

  it('should stay redacted when printed or serialized', () => {
    const secret = Secret.from('test-password');

    expect(String(secret)).toBe('[Secret]');
    expect(JSON.stringify({ password: secret })).toBe('{"password":"[Secret]"}');
    expect(inspect(secret)).toBe('[Secret]');
  });
});
