/**
 * Values read from a project.godot file.
 */
export interface ProjectConfig {
  configVersion?: number;
  name?: string;
  features: string[];
}

export interface ProjectInfo {
  name: string;
  path: string;
  projectFile: string;
  config: ProjectConfig;
  /** Version prefix the project needs, e.g. "4.2" or "3" */
  engineRequirement?: string;
}

export interface ProjectDetectionOptions {
  cwd?: string;
  recursive?: boolean;
}

export interface ProjectDetectionResult {
  isValid: boolean;
  project?: ProjectInfo;
  error?: string;
  warnings: string[];
}

export interface EngineDetectionResult {
  project?: ProjectInfo;
  engine?: string;
  error?: string;
  warnings: string[];
}
