import { describe, it, expect } from 'vitest';
import {
  ApiError,
  ApiLogicError,
  NoProfilesError,
  NotFoundError,
  TransportError,
  describeFailure,
  redact
} from '../errorHandler';

describe('describeFailure', () => {
  it('should point at the username for NotFoundError', () => {
    expect(describeFailure(new NotFoundError('Player "ghost" not found'), 'UUID lookup')).toEqual([
      'Player "ghost" not found',
      'Make sure the username is spelled correctly and the player exists.'
    ]);
  });

  it('should point at missing data for NoProfilesError', () => {
    const lines = describeFailure(new NoProfilesError('Foo has no SkyBlock profiles'), 'Profile lookup');
    expect(lines[0]).toBe('Foo has no SkyBlock profiles');
    expect(lines).toHaveLength(2);
  });

  it('should call out a rejected API key', () => {
    const error = new ApiError('Profile lookup', new ApiLogicError('HTTP 403: Invalid API key', 403), 1);
    expect(describeFailure(error, 'Profile lookup')).toEqual([
      'Profile lookup failed - HTTP 403: Invalid API key',
      'The API key was rejected. Check it and try again.'
    ]);
  });

  it('should call out network problems', () => {
    const error = new ApiError('UUID lookup', new TransportError('timeout of 30000ms exceeded'), 3);
    expect(describeFailure(error, 'UUID lookup')[1]).toBe(
      'This looks like a network or service problem. Try again in a moment.'
    );
  });

  it('should name the operation for unexpected errors', () => {
    expect(describeFailure(new TypeError('boom'), 'Extraction')).toEqual(['Extraction failed: boom']);
  });
});

describe('redact', () => {
  it('should hide every occurrence of the secret', () => {
    expect(redact('key test-key and test-key', 'test-key')).toBe('key <redacted> and <redacted>');
    expect(redact('nothing to hide')).toBe('nothing to hide');
  });
});
