import { describe, it, expect } from 'vitest';
import { matchRoute } from '../server.js';

describe('matchRoute', () => {
  it('should capture everything after /v1/', () => {
    expect(matchRoute('/v1/models')).toEqual({ pathSuffix: 'models', search: '' });
    expect(matchRoute('/v1/api/chat/stream')).toEqual({ pathSuffix: 'api/chat/stream', search: '' });
  });

  it('should split off the query string', () => {
    expect(matchRoute('/v1/models?x=1&y=2')).toEqual({ pathSuffix: 'models', search: '?x=1&y=2' });
  });

  it('should not match outside the prefix or with an empty suffix', () => {
    expect(matchRoute('/health')).toBeNull();
    expect(matchRoute('/v1')).toBeNull();
    expect(matchRoute('/v1/')).toBeNull();
    expect(matchRoute('/v1/?x=1')).toBeNull();
    expect(matchRoute('/v2/models')).toBeNull();
  });

  it.each([
    '/v1/../api/delete',
    '/v1/./models',
    '/v1/models/../../api/pull',
    '/v1/%2e%2e/api/delete',
    '/v1/%2E./api/delete',
    '/v1/.%2e/api/delete',
    '/v1/%2e/models',
    '/v1/..\\api\\delete',
    '/v1/models/..'
  ])('should refuse the dot segment in %s', (url) => {
    expect(matchRoute(url)).toBeNull();
  });

  it('should keep segments that merely contain dots', () => {
    expect(matchRoute('/v1/models/llama3.1')).toEqual({ pathSuffix: 'models/llama3.1', search: '' });
    expect(matchRoute('/v1/.../x')).toEqual({ pathSuffix: '.../x', search: '' });
    expect(matchRoute('/v1/.hidden')).toEqual({ pathSuffix: '.hidden', search: '' });
  });
});
