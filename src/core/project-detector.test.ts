import fs from 'fs-extra';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ProjectDetector } from './project-detector';
import { createTempDir } from './test-utils';

const PROJECT_FILE = `; Engine configuration file.
; It's best edited using the editor UI and not directly,

config_version=5

[application]

config/name="Space \\"Game\\""
run/main_scene="res://main.tscn"
config/features=PackedStringArray("4.2", "Forward Plus")
config/icon="res://icon.svg"

[rendering]

renderer/rendering_method="forward_plus"
`;

describe('ProjectDetector', () => {
  describe('parseProjectFile', () => {
    it('reads config_version, name and features', () => {
      expect(ProjectDetector.parseProjectFile(PROJECT_FILE)).toEqual({
        configVersion: 5,
        name: 'Space "Game"',
        features: ['4.2', 'Forward Plus'],
      });
    });

    it('ignores keys outside the sections it knows', () => {
      const config = ProjectDetector.parseProjectFile('[rendering]\nconfig/name="Wrong"\n');

      expect(config).toEqual({ features: [] });
    });
  });

  describe('engineRequirement', () => {
    it('prefers the version listed in the features', () => {
      expect(ProjectDetector.engineRequirement({ configVersion: 5, features: ['4.2', 'Mobile'] })).toBe('4.2');
    });

    it('falls back to the major implied by config_version', () => {
      expect(ProjectDetector.engineRequirement({ configVersion: 5, features: [] })).toBe('4');
      expect(ProjectDetector.engineRequirement({ configVersion: 4, features: [] })).toBe('3');
    });

    it('gives up for unknown projects', () => {
      expect(ProjectDetector.engineRequirement({ configVersion: 2, features: [] })).toBeUndefined();
      expect(ProjectDetector.engineRequirement({ features: [] })).toBeUndefined();
    });
  });

  describe('detectProject', () => {
    let root: string;

    beforeEach(async () => {
      root = await createTempDir();
    });

    afterEach(async () => {
      await fs.remove(root);
    });

    it('finds the project in the given directory', async () => {
      await fs.outputFile(path.join(root, 'project.godot'), PROJECT_FILE);

      const result = await ProjectDetector.detectProject({ cwd: root });

      expect(result.isValid).toBe(true);
      expect(result.warnings).toEqual([]);
      expect(result.project).toMatchObject({
        name: 'Space "Game"',
        path: root,
        projectFile: path.join(root, 'project.godot'),
        engineRequirement: '4.2',
      });
    });

    it('names the project after its directory when the file has no name', async () => {
      const projectDir = path.join(root, 'untitled');
      await fs.outputFile(path.join(projectDir, 'project.godot'), 'config_version=4\n');

      const result = await ProjectDetector.detectProject({ cwd: projectDir });

      expect(result.project?.name).toBe('untitled');
      expect(result.project?.engineRequirement).toBe('3');
    });

    it('searches sub-directories only when asked to', async () => {
      await fs.outputFile(path.join(root, 'games', 'demo', 'project.godot'), PROJECT_FILE);

      expect((await ProjectDetector.detectProject({ cwd: root })).isValid).toBe(false);

      const result = await ProjectDetector.detectProject({ cwd: root, recursive: true });
      expect(result.project?.path).toBe(path.join(root, 'games', 'demo'));
    });

    it('reports a missing project', async () => {
      const result = await ProjectDetector.detectProject({ cwd: root });

      expect(result).toEqual({
        isValid: false,
        error: 'No engine project (project.godot) found',
        warnings: [],
      });
    });

    it('warns when the engine version cannot be determined', async () => {
      await fs.outputFile(path.join(root, 'project.godot'), '[application]\nconfig/name="Old"\n');

      const result = await ProjectDetector.detectProject({ cwd: root });

      expect(result.isValid).toBe(true);
      expect(result.warnings).toEqual([
        'Missing config_version in project file',
        'Could not determine which engine version this project uses',
      ]);
    });
  });
});
