import {
  decodeDigestState,
  encodeDigestMap,
  findChangedContainers,
  mergeDigests,
  resolveStoredDigests,
} from './digest-state';
import { AnnotationFormatError, RegistryError } from '../errors';
import { ContainerInfo, ContainerResult } from './types';

const web: ContainerInfo = { name: 'web', image: 'nginx:latest', isInit: false };
const sidecar: ContainerInfo = { name: 'sidecar', image: 'envoy:v1', isInit: false };

const ok = (container: ContainerInfo, digest: string, source: 'registry' | 'pinned' = 'registry'): ContainerResult => ({
  ok: true,
  container,
  digest,
  source,
});

const failed = (container: ContainerInfo): ContainerResult => ({
  ok: false,
  container,
  error: new RegistryError('boom', 'server', { registry: 'r', repository: 'x', tag: 'y' }, 500),
});

describe('decodeDigestState', () => {
  test('should treat missing and blank values as empty', () => {
    expect(decodeDigestState(undefined)).toEqual({ format: 'empty' });
    expect(decodeDigestState('')).toEqual({ format: 'empty' });
    expect(decodeDigestState('  ')).toEqual({ format: 'empty' });
  });

  test('should parse a single canonical entry', () => {
    expect(decodeDigestState('web:sha256:111')).toEqual({
      format: 'canonical',
      digests: new Map([['web', 'sha256:111']]),
    });
  });

  test('should parse multiple canonical entries with whitespace', () => {
    expect(decodeDigestState('init-db:sha256:xyz789, nginx:sha256:abc123')).toEqual({
      format: 'canonical',
      digests: new Map([
        ['init-db', 'sha256:xyz789'],
        ['nginx', 'sha256:abc123'],
      ]),
    });
  });

  test.each(['sha256:999', 'sha384:legacy456', 'sha512:abc'])('should detect legacy bare digest %s', (value) => {
    expect(decodeDigestState(value)).toEqual({ format: 'legacy', digest: value });
  });

  test.each(['garbage', 'web:', ':sha256:1', 'web:notadigest', 'sha256:1,sha256:2', ',,'])(
    'should reject corrupt value %p',
    (value) => {
      expect(() => decodeDigestState(value)).toThrow(AnnotationFormatError);
    }
  );
});

describe('encodeDigestMap', () => {
  test('should sort entries by container name', () => {
    const encoded = encodeDigestMap(
      new Map([
        ['sidecar', 'sha256:def'],
        ['nginx', 'sha256:abc'],
        ['init-db', 'sha256:xyz'],
      ])
    );
    expect(encoded).toBe('init-db:sha256:xyz,nginx:sha256:abc,sidecar:sha256:def');
  });

  test('should encode an empty map as an empty string', () => {
    expect(encodeDigestMap(new Map())).toBe('');
  });

  test('should sort by code unit rather than locale', () => {
    expect(encodeDigestMap(new Map([['b', 'sha256:2'], ['B', 'sha256:1']]))).toBe('B:sha256:1,b:sha256:2');
  });

  test('should be a fixed point over canonical values', () => {
    const canonical = 'api:sha256:aaa,web:sha256:bbb,worker:sha256:ccc';
    const decoded = decodeDigestState(canonical);
    if (decoded.format !== 'canonical') {
      throw new Error(`expected canonical, got ${decoded.format}`);
    }
    expect(encodeDigestMap(decoded.digests)).toBe(canonical);
  });

  test('should canonicalize unordered input', () => {
    const decoded = decodeDigestState('web:sha256:bbb,api:sha256:aaa');
    if (decoded.format !== 'canonical') {
      throw new Error(`expected canonical, got ${decoded.format}`);
    }
    expect(encodeDigestMap(decoded.digests)).toBe('api:sha256:aaa,web:sha256:bbb');
  });
});

describe('resolveStoredDigests', () => {
  test('should assign a legacy digest to the first tracked container', () => {
    const digests = resolveStoredDigests({ format: 'legacy', digest: 'sha256:999' }, [web, sidecar]);
    expect(digests).toEqual(new Map([['web', 'sha256:999']]));
  });

  test('should return a copy of canonical digests', () => {
    const source = new Map([['web', 'sha256:1']]);
    const digests = resolveStoredDigests({ format: 'canonical', digests: source }, [web]);
    digests.set('other', 'sha256:2');
    expect(source.size).toBe(1);
  });

  test('should return an empty map for empty state', () => {
    expect(resolveStoredDigests({ format: 'empty' }, [web]).size).toBe(0);
  });
});

describe('mergeDigests', () => {
  test('should take fresh digests and carry forward failed containers', () => {
    const stored = new Map([
      ['web', 'sha256:old'],
      ['sidecar', 'sha256:kept'],
    ]);
    const merged = mergeDigests(stored, [web, sidecar], [ok(web, 'sha256:new'), failed(sidecar)]);
    expect(merged).toEqual(
      new Map([
        ['web', 'sha256:new'],
        ['sidecar', 'sha256:kept'],
      ])
    );
  });

  test('should drop entries for containers no longer tracked', () => {
    const stored = new Map([
      ['web', 'sha256:1'],
      ['removed', 'sha256:2'],
    ]);
    expect(mergeDigests(stored, [web], [ok(web, 'sha256:1')])).toEqual(new Map([['web', 'sha256:1']]));
  });

  test('should omit failed containers that have no stored digest', () => {
    expect(mergeDigests(new Map(), [web, sidecar], [ok(web, 'sha256:1'), failed(sidecar)])).toEqual(
      new Map([['web', 'sha256:1']])
    );
  });
});

describe('findChangedContainers', () => {
  test('should report new and changed registry digests', () => {
    const stored = new Map([['web', 'sha256:old']]);
    expect(findChangedContainers(stored, [ok(web, 'sha256:new'), ok(sidecar, 'sha256:1')])).toEqual([
      'web',
      'sidecar',
    ]);
  });

  test('should ignore unchanged digests and failures', () => {
    const stored = new Map([['web', 'sha256:same']]);
    expect(findChangedContainers(stored, [ok(web, 'sha256:same'), failed(sidecar)])).toEqual([]);
  });

  test('should never count pinned digests as changes', () => {
    expect(findChangedContainers(new Map(), [ok(web, 'sha256:pinned', 'pinned')])).toEqual([]);
  });
});
