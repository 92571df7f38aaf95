import { describe, expect, it } from 'vitest';

import type { CompiledPattern } from '../../src/compiled-pattern';
import { PatternCompiler } from '../../src/compiler/pattern-compiler';
import { resolveParserConfiguration } from '../../src/configuration';
import { getVariable } from '../../src/match-result';
import { Matcher, orderByPrecedence } from '../../src/matcher/matcher';

describe('Matcher :: match', () => {
  const compiler = new PatternCompiler();
  const matcher = new Matcher();
  const match = (path: string, pattern: string) => matcher.match(path, compiler.compile(pattern));

  it('should bind every variable of the pattern', () => {
    const result = match('/api/users/42/posts/7', '/api/users/{id}/posts/{postId}');

    expect(result.matched).toBe(true);
    expect(result.variables).toEqual({ id: '42', postId: '7' });
    expect(result.matchedSegments).toEqual(['api', 'users', '42', 'posts', '7']);
    expect(result.path).toBe('/api/users/42/posts/7');
    expect(result.pattern).toBe('/api/users/{id}/posts/{postId}');
  });

  it('should match a static pattern exactly', () => {
    expect(match('/health', '/health').matched).toBe(true);
    expect(match('/healthz', '/health').matched).toBe(false);
    expect(match('/health/1', '/health').matched).toBe(false);
    expect(match('/health/', '/health').matched).toBe(false);
  });

  it('should consume exactly one component for a single wildcard', () => {
    const result = match('/files/a.png', '/files/*');

    expect(result.matched).toBe(true);
    expect(result.wildcards).toEqual(['a.png']);
    expect(match('/files/a/b.png', '/files/*').matched).toBe(false);
    expect(match('/files', '/files/*').matched).toBe(false);
  });

  it('should require at least one component for a terminal multi-segment wildcard', () => {
    expect(match('/api', '/api/**').matched).toBe(false);
    expect(match('/api/', '/api/**').matched).toBe(false);

    const result = match('/api/v1/users', '/api/**');
    expect(result.matched).toBe(true);
    expect(result.wildcards).toEqual(['v1/users']);
  });

  it('should backtrack over a multi-segment wildcard in the middle', () => {
    const result = match('/static/a/b/file.js', '/static/**/file.js');

    expect(result.matched).toBe(true);
    expect(result.wildcards).toEqual(['a/b']);
    expect(match('/static/file.js', '/static/**/file.js').matched).toBe(false);
  });

  it('should undo bindings from abandoned split points', () => {
    const result = match('/a/x/y/z/end', '/a/**/{name}/end');

    expect(result.matched).toBe(true);
    expect(result.variables).toEqual({ name: 'z' });
    expect(result.wildcards).toEqual(['x/y']);
  });

  it('should accept the first split that consumes the whole path', () => {
    const result = match('/a/b/c', '/**/{tail}');

    expect(result.wildcards).toEqual(['a/b']);
    expect(result.variables).toEqual({ tail: 'c' });
  });

  it('should handle several multi-segment wildcards', () => {
    const result = match('/a/x/b/x/c', '/**/x/**');

    expect(result.matched).toBe(true);
    expect(result.wildcards).toEqual(['a', 'b/x/c']);
  });

  it('should apply variable constraints', () => {
    expect(match('/items/123', '/items/{sku:[0-9]+}').variables).toEqual({ sku: '123' });
    expect(match('/items/abc', '/items/{sku:[0-9]+}').matched).toBe(false);
    expect(match('/items/12a', '/items/{sku:\\d+}').matched).toBe(false);
  });

  it('should match the root only against the root', () => {
    expect(match('/', '/').matched).toBe(true);
    expect(match('/a', '/').matched).toBe(false);
  });

  it('should require agreement on a trailing separator', () => {
    expect(match('/docs/', '/docs/').matched).toBe(true);
    expect(match('/docs', '/docs/').matched).toBe(false);
    expect(match('/docs/', '/docs/{page}').matched).toBe(false);
  });

  it('should reject a path without a leading separator', () => {
    const result = match('users/1', '/users/{id}');

    expect(result.matched).toBe(false);
    expect(result.pattern).toBe('/users/{id}');
    expect(result.variables).toEqual({});
  });

  it('should trim the path and collapse doubled separators', () => {
    expect(match('  /health  ', '/health').matched).toBe(true);
    expect(match('/api//users/42', '/api/users/{id}').variables).toEqual({ id: '42' });
  });

  it('should keep variables on a null-prototype record', () => {
    const result = match('/users/7', '/users/{id}');

    expect(getVariable(result, 'id')).toBe('7');
    expect(getVariable(result, 'toString')).toBeUndefined();
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('should return equal results for repeated calls', () => {
    expect(match('/users/7', '/users/{id}')).toEqual(match('/users/7', '/users/{id}'));
  });
});

describe('Matcher :: options', () => {
  const matcher = new Matcher();

  it('should compare literals case-insensitively when the pattern asks for it', () => {
    const insensitive = new PatternCompiler(resolveParserConfiguration({ caseInsensitive: true }));
    const sensitive = new PatternCompiler();

    expect(matcher.match('/users', insensitive.compile('/Users')).matched).toBe(true);
    expect(matcher.match('/users', sensitive.compile('/Users')).matched).toBe(false);
    expect(matcher.match('/USERS/Abc', insensitive.compile('/Users/{id}')).variables).toEqual({ id: 'Abc' });
  });

  it('should ignore trailing separators when they are optional', () => {
    const compiler = new PatternCompiler(resolveParserConfiguration({ optionalTrailingSlash: true }));

    expect(matcher.match('/health/', compiler.compile('/health')).matched).toBe(true);
    expect(matcher.match('/docs', compiler.compile('/docs/')).matched).toBe(true);
    expect(matcher.match('/api/', compiler.compile('/api/**')).matched).toBe(false);
  });
});

describe('Matcher :: matchBest', () => {
  const compiler = new PatternCompiler();
  const matcher = new Matcher();
  const compileAll = (...patterns: string[]): CompiledPattern[] => patterns.map(pattern => compiler.compile(pattern));

  it('should prefer the static pattern', () => {
    const candidates = compileAll('/users/{id}', '/users/me');

    expect(matcher.matchBest('/users/me', candidates).pattern).toBe('/users/me');
    expect(matcher.matchBest('/users/42', candidates)).toMatchObject({ pattern: '/users/{id}', variables: { id: '42' } });
  });

  it('should prefer fewer multi-segment wildcards over a higher rank', () => {
    const candidates = compileAll('/a/**/**', '/*/**');

    expect(matcher.matchBest('/a/b/c', candidates).pattern).toBe('/*/**');
  });

  it('should prefer the higher rank among equal wildcard counts', () => {
    const candidates = compileAll('/{a}/{b}', '/x/{b}');

    expect(matcher.matchBest('/x/y', candidates).pattern).toBe('/x/{b}');
  });

  it('should keep input order for equal candidates', () => {
    expect(matcher.matchBest('/x', compileAll('/{a}', '/{b}')).pattern).toBe('/{a}');
    expect(matcher.matchBest('/x', compileAll('/{b}', '/{a}')).pattern).toBe('/{b}');
  });

  it('should return a failed result with an empty pattern when nothing matches', () => {
    const result = matcher.matchBest('/nothing', compileAll('/a', '/b/{c}'));

    expect(result.matched).toBe(false);
    expect(result.pattern).toBe('');
    expect(result.path).toBe('/nothing');
  });

  it('should expose the winning compiled pattern through findBest', () => {
    const candidates = compileAll('/files/**', '/files/{name}');
    const best = matcher.findBest('/files/report.pdf', candidates);

    expect(best?.pattern).toBe(candidates[1]);
    expect(best?.result.variables).toEqual({ name: 'report.pdf' });
    expect(matcher.findBest('/other', candidates)).toBeNull();
    expect(matcher.findBest('/files/x', [])).toBeNull();
  });

  it('should order candidates by precedence', () => {
    const ordered = orderByPrecedence(compileAll('/**', '/{a}/**', '/a/b', '/{a}/{b}', '/a/{b}'));

    expect(ordered.map(pattern => pattern.source)).toEqual(['/a/b', '/a/{b}', '/{a}/{b}', '/{a}/**', '/**']);
  });
});
