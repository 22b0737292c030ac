import { describe, it, expect } from 'vitest';
import { CircuitOpenError, ConfigError, DeliveryError, NewsbriefError, errorMessage } from '../../src/lib/errors';

describe('errors', () => {
  it('should name errors after their class', () => {
    expect(new CircuitOpenError('gnews', 12).name).toBe('CircuitOpenError');
    expect(new DeliveryError('nope', 500).name).toBe('DeliveryError');
  });

  it('should share a base class', () => {
    expect(new ConfigError(['x'])).toBeInstanceOf(NewsbriefError);
    expect(new CircuitOpenError('gnews', 1)).toBeInstanceOf(Error);
  });

  it('should describe an open circuit', () => {
    const error = new CircuitOpenError('newsapi', 42.5);

    expect(error.message).toBe('Circuit newsapi is open');
    expect(error.circuitName).toBe('newsapi');
    expect(error.retryAfterSeconds).toBe(42.5);
  });

  it('should list config issues in the message', () => {
    expect(new ConfigError(['A: bad', 'B: worse']).message).toBe('Invalid configuration:\n  - A: bad\n  - B: worse');
  });

  it('should extract messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(404)).toBe('404');
  });
});
