/**
 * @fileoverview Tests for the get command.
 *
 * @module commands/get.test
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createGetCommand, runGet } from './get.js';
import { PODS_YAML, SERVICES_YAML, STATUS_JSON, tableLine } from '../../test/fixtures/paths.js';

class CollectingWriter {
  readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  get text(): string {
    return this.chunks.join('');
  }
}

const SERVICE_HEADER = tableLine('NAME', 'LABELS', 'SELECTOR', 'IP', 'PORT');

describe('createGetCommand', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'kprint-get-test-'));
    configPath = path.join(tempDir, 'kprint.yaml');
    await fs.writeFile(configPath, 'logLevel: info\n');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should be named "get"', () => {
    expect(createGetCommand().name()).toBe('get');
  });

  it('should require at least one file', () => {
    const [files] = createGetCommand().registeredArguments;
    expect(files.name()).toBe('files');
    expect(files.required).toBe(true);
    expect(files.variadic).toBe(true);
  });

  describe('runGet', () => {
    it('prints the header once across lists of the same kind', async () => {
      const out = new CollectingWriter();

      await runGet([SERVICES_YAML], { headers: true, config: configPath }, out);

      expect(out.text).toBe(
        SERVICE_HEADER +
          tableLine('frontend', 'tier=web', 'app=frontend', '10.0.0.1', '80') +
          tableLine('backend', 'tier=web', 'app=backend', '', '8080') +
          tableLine('cache', '', '', '', '6379')
      );
    });

    it('prints a header at each kind change across files', async () => {
      const out = new CollectingWriter();

      await runGet([PODS_YAML, STATUS_JSON], { headers: true, config: configPath }, out);

      expect(out.text).toBe(
        tableLine('NAME', 'IMAGE(S)', 'HOST', 'LABELS', 'STATUS') +
          tableLine('web-1', 'nginx:1.25', 'node-a/10.0.0.5', 'app=web', 'Running') +
          'NAME\nnode-a\n' +
          'STATUS\nSuccess\n'
      );
    });

    it('omits headers with --no-headers', async () => {
      const out = new CollectingWriter();

      await runGet([STATUS_JSON], { headers: false, config: configPath }, out);

      expect(out.text).toBe('Success\n');
    });

    it('takes noHeaders from the config file', async () => {
      await fs.writeFile(configPath, 'output:\n  noHeaders: true\n');
      const out = new CollectingWriter();

      await runGet([STATUS_JSON], { headers: true, config: configPath }, out);

      expect(out.text).toBe('Success\n');
    });

    it('prints JSON at the requested version', async () => {
      const out = new CollectingWriter();

      await runGet([STATUS_JSON], { output: 'json', outputVersion: 'v1beta1', headers: true, config: configPath }, out);

      expect(out.chunks).toEqual(['{\n    "kind": "Status",\n    "apiVersion": "v1beta1",\n    "status": "Success"\n}\n']);
    });

    it('keeps fields the known kinds do not model in JSON output', async () => {
      const podPath = path.join(tempDir, 'pod.yaml');
      await fs.writeFile(
        podPath,
        [
          'kind: Pod',
          'metadata:',
          '  name: web-1',
          '  annotations:',
          '    owner: team-a',
          'spec:',
          '  restartPolicy: Always',
          '  containers:',
          '    - name: nginx',
          '      image: nginx:1.25',
          '      command: [sh]',
          '',
        ].join('\n')
      );
      const out = new CollectingWriter();

      await runGet([podPath], { output: 'json', headers: true, config: configPath }, out);

      expect(JSON.parse(out.text)).toEqual({
        kind: 'Pod',
        apiVersion: 'v1beta2',
        metadata: { name: 'web-1', annotations: { owner: 'team-a' } },
        spec: {
          restartPolicy: 'Always',
          containers: [{ name: 'nginx', image: 'nginx:1.25', command: ['sh'] }],
        },
      });
    });

    it('uses the output format from the config file unless a flag overrides it', async () => {
      await fs.writeFile(configPath, 'output:\n  format: yaml\n');

      const fromFile = new CollectingWriter();
      await runGet([STATUS_JSON], { headers: true, config: configPath }, fromFile);
      expect(fromFile.text).toBe('apiVersion: v1beta2\nkind: Status\nstatus: Success\n');

      const fromFlag = new CollectingWriter();
      await runGet([STATUS_JSON], { output: 'json', headers: true, config: configPath }, fromFlag);
      expect(fromFlag.text).toBe('{\n    "kind": "Status",\n    "apiVersion": "v1beta2",\n    "status": "Success"\n}\n');
    });

    it('renders an inline template for every object', async () => {
      const out = new CollectingWriter();

      await runGet(
        [SERVICES_YAML],
        {
          output: 'template',
          template: '{% for s in items %}{{ s.metadata.name }} {% endfor %}',
          headers: true,
          config: configPath,
        },
        out
      );

      expect(out.chunks).toEqual(['frontend backend ', 'cache ']);
    });

    it('renders a template file', async () => {
      const templatePath = path.join(tempDir, 'status.tmpl');
      await fs.writeFile(templatePath, '{{ kind }}={{ status }}');
      const out = new CollectingWriter();

      await runGet(
        [STATUS_JSON],
        { output: 'templatefile', template: templatePath, headers: true, config: configPath },
        out
      );

      expect(out.text).toBe('Status=Success');
    });

    it('rejects an unknown output format', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});

      await expect(
        runGet([STATUS_JSON], { output: 'xml', headers: true, config: configPath }, new CollectingWriter())
      ).rejects.toThrow('invalid configuration: output.format:');
    });

    it('rejects template output without a template', async () => {
      await expect(
        runGet([STATUS_JSON], { output: 'template', headers: true, config: configPath }, new CollectingWriter())
      ).rejects.toThrow('template format specified but no template given');
    });
  });

  describe('action', () => {
    it('writes printed resources to stdout', async () => {
      const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      const program = new Command().addCommand(createGetCommand());
      await program.parseAsync(['get', STATUS_JSON, '-o', 'yaml', '-c', configPath], { from: 'user' });

      expect(writeSpy).toHaveBeenCalledWith('apiVersion: v1beta2\nkind: Status\nstatus: Success\n');
    });

    it('prints the error and exits with status 1 on failure', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
      const missing = path.join(tempDir, 'missing.yaml');

      const program = new Command().addCommand(createGetCommand());
      await program.parseAsync(['get', missing, '-c', configPath], { from: 'user' });

      expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining(`Error: unable to read ${missing}: ENOENT`));
      expect(exitSpy).toHaveBeenCalledWith(1);
    });
  });
});
