import { describe, it, expect } from 'vitest';
import { YamlPrinter } from './yaml.js';
import { BufferWriter, catchError, createMinion, createStatus } from '../../test/fixtures/resources.js';

describe('YamlPrinter', () => {
  it('should print the versioned object with sorted keys', () => {
    const out = new BufferWriter();

    new YamlPrinter('v1beta2').printObj(createStatus(), out);

    expect(out.text).toBe('apiVersion: v1beta2\nkind: Status\nstatus: Success\n');
  });

  it('should honour the indent option', () => {
    const out = new BufferWriter();

    new YamlPrinter('v1beta1', { indent: 4 }).printObj(createMinion('node-b'), out);

    expect(out.text).toBe('apiVersion: v1beta1\nkind: Minion\nmetadata:\n    name: node-b\n');
  });

  it('should replace the in-memory API version', () => {
    const out = new BufferWriter();

    new YamlPrinter('v1beta1').printObj({ ...createStatus('Failure'), apiVersion: 'v1beta2' }, out);

    expect(out.text).toBe('apiVersion: v1beta1\nkind: Status\nstatus: Failure\n');
  });

  it('should fail with an Encoding error for an object without a kind', () => {
    const error = catchError(() => new YamlPrinter('v1beta2').printObj({ kind: '' }, new BufferWriter()));

    expect(error).toMatchObject({ kind: 'Encoding', message: 'object has no kind set' });
  });

  it('should report versioned output', () => {
    expect(new YamlPrinter('v1beta2').isVersioned()).toBe(true);
  });
});
