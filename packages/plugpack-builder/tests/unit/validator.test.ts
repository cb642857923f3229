/**
 * Unit tests for the validator
 */

import fs from 'fs-extra';
import path from 'path';
import { UnsupportedFormatVersionError, ValidationViolation } from '@plugpack/errors';
import { loadPluginDocuments } from '../../src/loader/document-loader';
import { validate, ValidationReport } from '../../src/validation/validator';
import { createPlugin, Document, metadataFor, PluginTree } from '../helpers/plugin-tree';
import type { FormatVersion } from '../../src/types/plugin';

async function validateTree(version: FormatVersion, tree: Partial<PluginTree> = {}): Promise<ValidationReport> {
  const root = await createPlugin(version, tree);
  return validate(await loadPluginDocuments(root));
}

function summary(violations: readonly ValidationViolation[]): string[][] {
  return violations.map((v) => [v.location.document, v.location.path, v.ruleId, v.severity]);
}

function withoutField(document: Document, field: string): Document {
  const copy = { ...document };
  delete copy[field];
  return copy;
}

describe('validate', () => {
  describe('metadata', () => {
    it('accepts a complete plugin of every version', async () => {
      for (const version of ['1.0.0', '2.0.0', '3.0.0'] as const) {
        const report = await validateTree(version);

        expect(report.violations).toEqual([]);
        expect(report.formatVersion).toBe(version);
        expect(report.plugin?.descriptor.name).toBe('demo_plugin');
      }
    });

    it('reports a missing author list in 2.0.0 as exactly one violation', async () => {
      const report = await validateTree('2.0.0', { metadata: withoutField(metadataFor('2.0.0'), 'authors') });

      expect(report.violations).toEqual([
        {
          location: { document: 'metadata.yaml', path: 'authors' },
          ruleId: 'required-field',
          message: 'missing required field "authors"',
          severity: 'error',
        },
      ]);
      expect(report.plugin).toBeUndefined();
    });

    it('does not require authors, licenses or homepage in 1.0.0', async () => {
      let metadata = metadataFor('1.0.0');
      for (const field of ['authors', 'licenses', 'homepage']) {
        metadata = withoutField(metadata, field);
      }

      const report = await validateTree('1.0.0', { metadata });

      expect(report.violations).toEqual([]);
    });

    it('requires groups in 3.0.0 but accepts an empty list', async () => {
      const missing = await validateTree('3.0.0', { metadata: withoutField(metadataFor('3.0.0'), 'groups') });
      const empty = await validateTree('3.0.0', { metadata: metadataFor('3.0.0', { groups: [] }) });

      expect(summary(missing.violations)).toEqual([['metadata.yaml', 'groups', 'required-field', 'error']]);
      expect(empty.violations).toEqual([]);
    });

    it('warns about unknown fields without failing', async () => {
      const report = await validateTree('2.0.0', { metadata: metadataFor('2.0.0', { platform_version: ['6.0'] }) });

      expect(report.violations).toEqual([
        {
          location: { document: 'metadata.yaml', path: 'platform_version' },
          ruleId: 'unknown-field',
          message: 'unknown field "platform_version" is ignored by package format 2.0.0',
          severity: 'warning',
        },
      ]);
      expect(report.plugin).toBeDefined();
    });

    it('reports wrong types and enum values with their path', async () => {
      const metadata = metadataFor('2.0.0', {
        title: 42,
        releases: [
          {
            os: 'windows',
            os_version: '2014.2-6.0',
            deployment_mode: 'ha',
            deployment_scripts_path: 'deployment_scripts/',
            repository_path: 'repositories/ubuntu',
          },
        ],
      });

      const report = await validateTree('2.0.0', { metadata });

      expect(summary(report.violations)).toEqual([
        ['metadata.yaml', 'releases[0].os', 'enum-value', 'error'],
        ['metadata.yaml', 'title', 'field-type', 'error'],
      ]);
      expect(report.violations[0].message).toBe(
        '"releases[0].os" has value "windows"; allowed values are: ubuntu, centos'
      );
      expect(report.violations[1].message).toBe('"title" must be string, got number');
    });

    it('reports release directories that do not exist', async () => {
      const metadata = metadataFor('2.0.0');
      const releases = [
        {
          os: 'ubuntu',
          os_version: '2014.2-6.0',
          deployment_mode: 'ha',
          deployment_scripts_path: 'deployment_scripts/',
          repository_path: 'repositories/missing',
        },
      ];

      const report = await validateTree('2.0.0', { metadata: { ...metadata, releases } });

      expect(report.violations).toEqual([
        {
          location: { document: 'metadata.yaml', path: 'releases[0].repository_path' },
          ruleId: 'missing-path',
          message: 'directory "repositories/missing" does not exist in the plugin',
          severity: 'error',
        },
      ]);
    });

    it('fails fast on an unsupported format version', async () => {
      const root = await createPlugin('2.0.0', {
        metadata: metadataFor('2.0.0', { package_format_version: '9.9.9', authors: 'not a list' }),
      });

      await expect(validate(await loadPluginDocuments(root))).rejects.toBeInstanceOf(UnsupportedFormatVersionError);
    });
  });

  describe('documents', () => {
    it('reports invalid YAML as a document violation', async () => {
      const report = await validateTree('2.0.0', { metadata: 'name: [unclosed\n' });

      expect(summary(report.violations)).toEqual([['metadata.yaml', '(document)', 'document-syntax', 'error']]);
      expect(report.violations[0].message).toMatch(/^invalid YAML at line \d+: /);
      expect(report.formatVersion).toBeUndefined();
    });

    it('reports a missing document', async () => {
      const root = await createPlugin('2.0.0');
      await fs.remove(path.join(root, 'tasks.yaml'));

      const report = await validate(await loadPluginDocuments(root));

      expect(report.violations).toEqual([
        {
          location: { document: 'tasks.yaml', path: '(document)' },
          ruleId: 'missing-document',
          message: 'tasks.yaml is missing from the plugin directory',
          severity: 'error',
        },
      ]);
    });

    it('reports a document that cannot be read', async () => {
      const root = await createPlugin('2.0.0');
      await fs.remove(path.join(root, 'tasks.yaml'));
      await fs.ensureDir(path.join(root, 'tasks.yaml'));

      const report = await validate(await loadPluginDocuments(root));

      expect(summary(report.violations)).toEqual([['tasks.yaml', '(document)', 'document-read', 'error']]);
      expect(report.violations[0].message).toMatch(/^tasks\.yaml could not be read: /);
    });

    it('rejects a metadata document that is not a mapping', async () => {
      const report = await validateTree('2.0.0', { metadata: '- just\n- a list\n' });

      expect(summary(report.violations)).toEqual([['metadata.yaml', '(document)', 'document-type', 'error']]);
    });
  });

  describe('tasks', () => {
    it('explains a missing timeout', async () => {
      const tasks = [
        { id: 'prepare', role: '*', stage: 'pre_deployment', type: 'shell', parameters: { cmd: './prepare.sh' } },
      ];

      const report = await validateTree('2.0.0', { tasks });

      expect(report.violations).toEqual([
        {
          location: { document: 'tasks.yaml', path: '[0].parameters.timeout' },
          ruleId: 'task-timeout-required',
          message:
            'task "prepare" of type "shell" needs parameters.timeout, the number of seconds to wait for the command ' +
            'to finish (for example "timeout: 360")',
          severity: 'error',
        },
      ]);
    });

    it('names the defaulted id of a 1.0.0 task without a timeout', async () => {
      const tasks = [
        {
          role: ['controller'],
          stage: 'post_deployment',
          type: 'puppet',
          parameters: { puppet_manifest: 'site.pp', puppet_modules: 'modules' },
        },
      ];

      const report = await validateTree('1.0.0', { tasks });

      expect(report.violations.map((v) => v.message)).toEqual([
        'task "task-0" of type "puppet" needs parameters.timeout, the number of seconds to wait for the puppet run ' +
          'to finish (for example "timeout: 360")',
      ]);
    });

    it('checks the structural parameters of each task type', async () => {
      const tasks = [{ id: 'configure', role: '*', stage: 'deployment', type: 'puppet', parameters: { timeout: 10 } }];

      const report = await validateTree('2.0.0', { tasks });

      expect(summary(report.violations)).toEqual([
        ['tasks.yaml', '[0].parameters.puppet_manifest', 'required-field', 'error'],
        ['tasks.yaml', '[0].parameters.puppet_modules', 'required-field', 'error'],
      ]);
    });

    it('reports duplicate ids, malformed and unknown stages', async () => {
      const shell = { cmd: 'true', timeout: 1 };
      const tasks = [
        { id: 'a', role: '*', stage: 'pre_deployment', type: 'shell', parameters: shell },
        { id: 'a', role: '*', stage: 'deployment/abc', type: 'shell', parameters: shell },
        { id: 'b', role: '*', stage: 'cleanup', type: 'shell', parameters: shell },
      ];

      const report = await validateTree('2.0.0', { tasks });

      expect(report.violations.map((v) => [v.location.path, v.ruleId, v.message])).toEqual([
        ['[1].id', 'duplicate-task-id', 'task id "a" is already used by task [0]'],
        ['[1].stage', 'stage-format', 'stage "deployment/abc" must be "<name>" or "<name>/<number>", e.g. "deployment/10"'],
        [
          '[2].stage',
          'unknown-stage',
          'stage "cleanup" is not known to package format 2.0.0; use one of: pre_deployment, deployment, post_deployment',
        ],
      ]);
    });

    it('keeps 1.0.0 to its own stages and task types', async () => {
      const tasks = [{ role: '*', stage: 'deployment', type: 'reboot', parameters: { timeout: 5 } }];

      const report = await validateTree('1.0.0', { tasks });

      expect(summary(report.violations)).toEqual([
        ['tasks.yaml', '[0].stage', 'unknown-stage', 'error'],
        ['tasks.yaml', '[0].type', 'enum-value', 'error'],
      ]);
      expect(report.violations[1].message).toBe('"[0].type" has value "reboot"; allowed values are: puppet, shell');
    });

    it('reports task types named like object members as unknown', async () => {
      const shell = { cmd: 'true', timeout: 1 };
      const tasks = ['constructor', 'toString', '__proto__'].map((type, index) => ({
        id: `t${index}`,
        role: '*',
        stage: 'deployment',
        type,
        parameters: shell,
      }));

      const report = await validateTree('2.0.0', { tasks });

      expect(summary(report.violations)).toEqual([
        ['tasks.yaml', '[0].type', 'enum-value', 'error'],
        ['tasks.yaml', '[1].type', 'enum-value', 'error'],
        ['tasks.yaml', '[2].type', 'enum-value', 'error'],
      ]);
      expect(report.violations[0].message).toBe(
        '"[0].type" has value "constructor"; allowed values are: puppet, shell, reboot'
      );
    });

    it('requires task ids from 2.0.0', async () => {
      const tasks = [{ role: '*', stage: 'deployment', type: 'reboot', parameters: { timeout: 5 } }];

      const report = await validateTree('2.0.0', { tasks });

      expect(summary(report.violations)).toEqual([['tasks.yaml', '[0].id', 'required-field', 'error']]);
    });

    it('rejects an empty role list', async () => {
      const tasks = [{ id: 'x', role: [], stage: 'deployment', type: 'reboot', parameters: { timeout: 5 } }];

      const report = await validateTree('2.0.0', { tasks });

      expect(report.violations.map((v) => [v.location.path, v.ruleId, v.message])).toEqual([
        ['[0].role', 'field-format', '"[0].role" must be "*" or a non-empty list of role names'],
      ]);
    });

    it('rejects a role that is neither "*" nor a list', async () => {
      const tasks = [{ id: 'x', role: 'controller', stage: 'deployment', type: 'reboot', parameters: { timeout: 5 } }];

      const report = await validateTree('2.0.0', { tasks });

      expect(report.violations.map((v) => [v.location.path, v.ruleId, v.message])).toEqual([
        ['[0].role', 'field-type', '"[0].role" must be "*" or a non-empty list of role names'],
      ]);
    });

    it('passes validated tasks on with their parameters', async () => {
      const report = await validateTree('2.0.0');
      const configure = report.plugin?.tasks.find((task) => task.id === 'configure');

      expect(configure?.parameters.get('puppet_manifest')).toBe('site.pp');
      expect(configure?.role).toEqual(['controller']);
    });
  });

  describe('environment', () => {
    it('treats attributes as optional', async () => {
      const report = await validateTree('2.0.0', { environment: {} });

      expect(report.violations).toEqual([]);
      expect(report.plugin?.environment).toEqual({});
    });

    it('accepts an empty environment document', async () => {
      const report = await validateTree('2.0.0', { environment: '' });

      expect(report.violations).toEqual([]);
    });

    it('requires the sub-fields of a declared attribute', async () => {
      const report = await validateTree('2.0.0', { environment: { attributes: { extra: { type: 'text' } } } });

      expect(report.violations).toEqual([
        {
          location: { document: 'environment_config.yaml', path: 'attributes.extra.label' },
          ruleId: 'required-field',
          message: 'missing required field "attributes.extra.label"',
          severity: 'error',
        },
      ]);
    });

    it('rejects an empty default on a required attribute', async () => {
      const environment = { attributes: { token: { type: 'password', label: 'Token', value: '', required: true } } };

      const report = await validateTree('2.0.0', { environment });

      expect(summary(report.violations)).toEqual([
        ['environment_config.yaml', 'attributes.token.value', 'required-attribute-default', 'error'],
      ]);
    });

    it('checks attributes referenced by restrictions', async () => {
      const environment = {
        attributes: {
          toggle: {
            type: 'checkbox',
            label: 'Toggle',
            value: false,
            restrictions: [
              'settings:demo_plugin.missing.value == true',
              "settings:cluster.other.value == 'x'",
              { condition: 'ghost.value != 1', message: 'Ghost must be 1' },
              'toggle.value == false',
            ],
          },
        },
      };

      const report = await validateTree('2.0.0', { environment });

      expect(report.violations.map((v) => [v.location.path, v.ruleId, v.message])).toEqual([
        [
          'attributes.toggle.restrictions[0]',
          'restriction-reference',
          'restriction "settings:demo_plugin.missing.value == true" references undeclared attribute "missing"',
        ],
        [
          'attributes.toggle.restrictions[2].condition',
          'restriction-reference',
          'restriction "ghost.value != 1" references undeclared attribute "ghost"',
        ],
      ]);
    });
  });

  it('accumulates violations from every document', async () => {
    const report = await validateTree('2.0.0', {
      metadata: withoutField(metadataFor('2.0.0'), 'homepage'),
      tasks: [{ id: 'x', role: '*', stage: 'deployment', type: 'shell', parameters: { cmd: 'true' } }],
      environment: { attributes: { a: { label: 'A' } } },
    });

    expect(summary(report.violations)).toEqual([
      ['environment_config.yaml', 'attributes.a.type', 'required-field', 'error'],
      ['metadata.yaml', 'homepage', 'required-field', 'error'],
      ['tasks.yaml', '[0].parameters.timeout', 'task-timeout-required', 'error'],
    ]);
  });
});
