import { describe, it, expect } from 'vitest';
import { validateCredentials } from '../../src/services/validator.js';
import { MalformedRequestError, MissingCredentialError } from '../../src/lib/errors.js';

describe('validateCredentials', () => {
  it('should accept a JSON body with both credentials', () => {
    expect(validateCredentials('{"client_id":"app","client_secret":"test-secret"}')).toEqual({
      clientId: 'app',
      clientSecret: 'test-secret',
    });
  });

  it('should accept a Buffer body', () => {
    const body = Buffer.from(JSON.stringify({ client_id: 'app', client_secret: 'test-secret' }));
    expect(validateCredentials(body).clientId).toBe('app');
  });

  it('should ignore unknown fields', () => {
    const result = validateCredentials('{"client_id":"app","client_secret":"s","extra":1}');
    expect(result).toEqual({ clientId: 'app', clientSecret: 's' });
  });

  describe('malformed bodies', () => {
    it.each([
      ['not json', 'not json'],
      ['empty string', ''],
      ['JSON array', '[1,2]'],
      ['numeric client_id', '{"client_id":42,"client_secret":"s"}'],
    ])('should reject %s', (_label, body) => {
      expect(() => validateCredentials(body)).toThrow(MalformedRequestError);
    });

    it('should use the fixed message', () => {
      expect(() => validateCredentials('{')).toThrow('Invalid request format');
    });
  });

  describe('missing credentials', () => {
    it.each([
      ['missing secret', '{"client_id":"app"}'],
      ['empty id', '{"client_id":"","client_secret":"s"}'],
      ['empty object', '{}'],
      ['JSON null', 'null'],
      ['null secret', '{"client_id":"app","client_secret":null}'],
      ['null id', '{"client_id":null,"client_secret":"s"}'],
    ])('should reject %s', (_label, body) => {
      expect(() => validateCredentials(body)).toThrow(MissingCredentialError);
    });

    it('should use the fixed message', () => {
      expect(() => validateCredentials('{}')).toThrow('Client ID and Client Secret are required');
    });
  });
});
