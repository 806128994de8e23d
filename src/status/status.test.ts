import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { getStatus, isHookInstalled, listBindings } from './status.js';
import { createTempDir, removeTempDir, writeTreeFile, writeTreeJson } from '../testing/tempTree.js';

function settingsWith(matcher: string, command: string) {
  return {
    hooks: {
      PostToolUse: [
        { matcher, hooks: [{ type: 'command', command }] }
      ]
    }
  };
}

describe('status', () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  describe('isHookInstalled', () => {
    it('should detect the hook on Skill calls', () => {
      const settings = writeTreeJson(root, 'settings.json', settingsWith('Skill', 'plugin-relay hook'));

      expect(isHookInstalled(settings)).toBe(true);
    });

    it('should detect the hook behind a wrapper command', () => {
      const settings = writeTreeJson(root, 'settings.json', settingsWith('Skill', 'npx plugin-relay hook --plugins-root /p'));

      expect(isHookInstalled(settings)).toBe(true);
    });

    it('should ignore hooks on other tools', () => {
      const settings = writeTreeJson(root, 'settings.json', settingsWith('Read', 'plugin-relay hook'));

      expect(isHookInstalled(settings)).toBe(false);
    });

    it('should ignore other hook commands', () => {
      const settings = writeTreeJson(root, 'settings.json', settingsWith('Skill', 'lint-on-save'));

      expect(isHookInstalled(settings)).toBe(false);
    });

    it('should return false for missing or malformed settings', () => {
      const malformed = writeTreeFile(root, 'broken.json', '{');
      const wrongShape = writeTreeJson(root, 'shape.json', { hooks: { PostToolUse: 'Skill' } });

      expect(isHookInstalled(join(root, 'missing.json'))).toBe(false);
      expect(isHookInstalled(malformed)).toBe(false);
      expect(isHookInstalled(wrongShape)).toBe(false);
    });
  });

  describe('listBindings', () => {
    it('should list bindings of live plugins ordered by name', () => {
      writeTreeJson(root, 'knowledge-work-plugins/zeta/.mcp.json', {
        mcpServers: { 'zeta-runner': { intercepts: ['run'] } }
      });
      writeTreeJson(root, 'knowledge-work-plugins/alpha/.mcp.json', {
        mcpServers: {
          'generate-redlined': { intercepts: ['review-contract'] },
          'search': { command: 'node' }
        }
      });
      writeTreeFile(root, 'knowledge-work-plugins/beta/README.md', 'no bindings');

      expect(listBindings(root)).toEqual([
        { plugin: 'alpha', server: 'generate-redlined', intercepts: ['review-contract'] },
        { plugin: 'zeta', server: 'zeta-runner', intercepts: ['run'] }
      ]);
    });

    it('should return an empty list without a plugin collection', () => {
      expect(listBindings(root)).toEqual([]);
    });
  });

  it('should combine hook and binding status', () => {
    const settingsPath = writeTreeJson(root, 'settings.json', settingsWith('Skill', 'plugin-relay hook'));
    writeTreeJson(root, 'plugins/knowledge-work-plugins/legal/.mcp.json', {
      mcpServers: { 'generate-redlined': { intercepts: ['review-contract'] } }
    });

    expect(getStatus({ settingsPath, pluginsRoot: join(root, 'plugins') })).toEqual({
      hookInstalled: true,
      bindings: [{ plugin: 'legal', server: 'generate-redlined', intercepts: ['review-contract'] }]
    });
  });
});
