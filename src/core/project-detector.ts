import fs from 'fs-extra';
import path from 'path';
import { glob } from 'glob';
import type {
  ProjectConfig,
  ProjectDetectionOptions,
  ProjectDetectionResult,
  ProjectInfo,
} from '../types/project';
import { Validator } from '../utils/validator';

export const PROJECT_FILE = 'project.godot';

/**
 * config_version written by each engine major
 */
const CONFIG_VERSION_MAJORS: Readonly<Record<number, string>> = {
  3: '3',
  4: '3',
  5: '4',
};

export class ProjectDetector {
  /**
   * Detect an engine project in the given directory
   */
  static async detectProject(options: ProjectDetectionOptions = {}): Promise<ProjectDetectionResult> {
    const cwd = options.cwd || process.cwd();
    const warnings: string[] = [];

    try {
      const projectFiles = await this.findProjectFiles(cwd, options.recursive);

      if (projectFiles.length === 0) {
        return {
          isValid: false,
          error: `No engine project (${PROJECT_FILE}) found`,
          warnings
        };
      }

      if (projectFiles.length > 1) {
        warnings.push(`Found ${projectFiles.length} projects, using ${projectFiles[0]}`);
      }

      const projectFile = projectFiles[0];
      const projectDir = path.dirname(projectFile);
      const content = await fs.readFile(projectFile, 'utf-8');
      const config = this.parseProjectFile(content);

      if (config.configVersion === undefined) {
        warnings.push('Missing config_version in project file');
      }

      const engineRequirement = this.engineRequirement(config);
      if (!engineRequirement) {
        warnings.push('Could not determine which engine version this project uses');
      }

      const project: ProjectInfo = {
        name: config.name || path.basename(projectDir),
        path: projectDir,
        projectFile,
        config,
        engineRequirement
      };

      return {
        isValid: true,
        project,
        warnings
      };

    } catch (error) {
      return {
        isValid: false,
        error: error instanceof Error ? error.message : String(error),
        warnings
      };
    }
  }

  /**
   * Parse the INI-style project file. Only the keys the version manager needs are read.
   */
  static parseProjectFile(content: string): ProjectConfig {
    const config: ProjectConfig = { features: [] };
    let section = '';

    for (const rawLine of content.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line || line.startsWith(';') || line.startsWith('#')) continue;

      const sectionMatch = line.match(/^\[([^\]]+)\]$/);
      if (sectionMatch) {
        section = sectionMatch[1];
        continue;
      }

      const separator = line.indexOf('=');
      if (separator === -1) continue;

      const key = line.slice(0, separator).trim();
      const value = line.slice(separator + 1).trim();

      if (section === '' && key === 'config_version') {
        const version = parseInt(value, 10);
        if (!Number.isNaN(version)) {
          config.configVersion = version;
        }
      } else if (section === 'application' && key === 'config/name') {
        config.name = this.unquote(value);
      } else if (section === 'application' && key === 'config/features') {
        config.features = Array.from(value.matchAll(/"([^"]*)"/g), match => match[1]);
      }
    }

    return config;
  }

  /**
   * Version prefix the project needs: an explicit feature tag such as "4.2", else the major implied by config_version
   */
  static engineRequirement(config: ProjectConfig): string | undefined {
    const featureVersion = config.features.find(feature => /^\d+\.\d+$/.test(feature));
    if (featureVersion && Validator.isEngineRequirement(featureVersion)) {
      return featureVersion;
    }

    if (config.configVersion !== undefined) {
      return CONFIG_VERSION_MAJORS[config.configVersion];
    }

    return undefined;
  }

  private static async findProjectFiles(cwd: string, recursive?: boolean): Promise<string[]> {
    const pattern = recursive ? `**/${PROJECT_FILE}` : PROJECT_FILE;
    const files = await glob(pattern, { cwd, absolute: true, ignore: ['**/node_modules/**', '**/.godot/**'] });
    return files.sort();
  }

  private static unquote(value: string): string {
    const match = value.match(/^"(.*)"$/);
    return match ? match[1].replace(/\\"/g, '"') : value;
  }
}
