import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  loadConfig,
  loadConfigFromDirectory,
  loadRules,
  resolveNotificationUrls,
} from '../../../src/infrastructure/config/rule-loader.js';
import { ConfigError } from '../../../src/domain/index.js';

const LABEL_RULES = `
version: "1.0"
global:
  default_timeout: 10s
  notification_urls:
    slack: "\${SLACK_TEST_URL}"
rules:
  - id: label-prs
    name: Label new pull requests
    enabled: true
    priority: 10
    conditions:
      - type: event_type
        operator: equals
        value: pull_request.opened
    actions:
      - type: add_label
        parameters:
          labels: [needs-review]
`;

const COMMENT_RULES = `
version: 1.0
rules:
  - id: welcome
    name: Welcome first issue
    enabled: true
    conditions:
      - type: event_type
        operator: equals
        value: issues.opened
    actions:
      - type: create_comment
        async: true
        timeout: 5s
        parameters:
          body: "Thanks {{sender.login}}!"
`;

describe('rule loader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hookflow-rules-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('reads a YAML document and applies defaults', async () => {
      const file = join(dir, 'labels.yaml');
      await writeFile(file, LABEL_RULES);

      const config = await loadConfig(file);

      expect(config.version).toBe('1.0');
      expect(config.global.default_timeout).toBe('10s');
      expect(config.global.max_concurrency).toBe(10);
      expect(config.rules).toHaveLength(1);
      expect(config.rules[0]?.actions[0]?.parameters).toEqual({ labels: ['needs-review'] });
    });

    it('reads an unquoted 1.0 version', async () => {
      const file = join(dir, 'comments.yml');
      await writeFile(file, COMMENT_RULES);

      expect((await loadConfig(file)).version).toBe('1.0');
    });

    it('reports a missing file', async () => {
      await expect(loadConfig(join(dir, 'absent.yaml'))).rejects.toThrow(ConfigError);
      await expect(loadConfig(join(dir, 'absent.yaml'))).rejects.toThrow(/^failed to read config file /);
    });

    it('reports invalid YAML', async () => {
      const file = join(dir, 'broken.yaml');
      await writeFile(file, 'rules: [unclosed');

      await expect(loadConfig(file)).rejects.toThrow(/^failed to parse config file /);
    });
  });

  describe('loadConfigFromDirectory', () => {
    it('loads YAML files in name order and ignores others', async () => {
      await writeFile(join(dir, 'b-comments.yml'), COMMENT_RULES);
      await writeFile(join(dir, 'a-labels.yaml'), LABEL_RULES);
      await writeFile(join(dir, 'notes.txt'), 'not a rule file');

      const configs = await loadConfigFromDirectory(dir);

      expect(configs.map((c) => c.rules[0]?.id)).toEqual(['label-prs', 'welcome']);
    });

    it('reports a missing directory', async () => {
      await expect(loadConfigFromDirectory(join(dir, 'nope')))
        .rejects.toThrow(/^failed to read config directory /);
    });
  });

  describe('loadRules', () => {
    it('merges file and directory sources into engine rules', async () => {
      const file = join(dir, 'labels.yaml');
      const rulesDir = join(dir, 'more');
      await writeFile(file, LABEL_RULES);
      await mkdir(rulesDir);
      await writeFile(join(rulesDir, 'comments.yaml'), COMMENT_RULES);

      const { config, rules } = await loadRules({ file, dir: rulesDir });

      expect(rules.map((r) => r.id)).toEqual(['label-prs', 'welcome']);
      // The later document leaves default_timeout at its default.
      expect(config.global.default_timeout).toBe('30s');
      expect(rules[1]?.actions[0]).toEqual({
        type: 'create_comment',
        parameters: { body: 'Thanks {{sender.login}}!' },
        async: true,
        timeout: '5s',
      });
    });

    it('loads the bundled example file', async () => {
      const file = fileURLToPath(new URL('../../../config/rules.example.yaml', import.meta.url));

      const { config, rules } = await loadRules({ file });

      expect(rules.map((r) => r.id)).toEqual(['label-new-prs', 'welcome-issues', 'announce-releases', 'rerun-docs']);
      expect(rules[3]?.enabled).toBe(false);
      expect(config.global.notification_urls).toEqual({
        slack: '${SLACK_WEBHOOK_URL}',
        discord: '${DISCORD_WEBHOOK_URL}',
      });
    });

    it('fails when no source is configured', async () => {
      await expect(loadRules({})).rejects.toThrow('no rule file or rule directory configured');
    });

    it('fails when the sources define no rules', async () => {
      const file = join(dir, 'empty.yaml');
      await writeFile(file, 'version: "1.0"\nrules: []\n');

      await expect(loadRules({ file })).rejects.toThrow('no rules defined');
    });

    it('fails on an invalid rule', async () => {
      const file = join(dir, 'bad.yaml');
      await writeFile(file, LABEL_RULES.replace('name: Label new pull requests', 'name: ""'));

      await expect(loadRules({ file })).rejects.toThrow('rule[0] missing name');
    });
  });
});

describe('resolveNotificationUrls', () => {
  it('expands environment references', () => {
    expect(resolveNotificationUrls(
      { slack: '${SLACK_TEST_URL}', static: 'https://hooks.example.test/x' },
      { SLACK_TEST_URL: 'https://hooks.slack.test/abc' },
    )).toEqual({
      slack: 'https://hooks.slack.test/abc',
      static: 'https://hooks.example.test/x',
    });
  });

  it('drops entries that expand to nothing', () => {
    expect(resolveNotificationUrls({ discord: '${UNSET_TEST_URL}' }, {})).toEqual({});
  });
});
