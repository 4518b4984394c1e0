import type { EngineDetectionResult } from '../types/project';
import type { EngineStore } from './engine-store';
import { ProjectDetector } from './project-detector';
import { VersionSpec } from './version-spec';

export class EngineResolver {
  /**
   * Resolve which installed engine should open the project in projectPath
   */
  static async resolveEngine(store: EngineStore, projectPath?: string): Promise<EngineDetectionResult> {
    const projectResult = await ProjectDetector.detectProject({ cwd: projectPath });
    const warnings = [...projectResult.warnings];

    if (!projectResult.project) {
      return { error: projectResult.error || 'Project detection failed', warnings };
    }

    const project = projectResult.project;
    if (!project.engineRequirement) {
      return { project, error: 'Project does not declare an engine version', warnings };
    }

    const installed = await store.listInstalled();
    const engine = this.findInstalledFor(project.engineRequirement, installed);

    if (!engine) {
      return {
        project,
        error: `No installed engine matches version ${project.engineRequirement}. Install one with 'engman install <version>'.`,
        warnings
      };
    }

    return { project, engine: engine.requested, warnings };
  }

  /**
   * Highest installed version satisfying a prefix requirement ("4.2" matches 4.2 and 4.2.1, not 4.20)
   */
  static findInstalledFor(requirement: string, installed: VersionSpec[]): VersionSpec | undefined {
    const candidates = installed.filter(spec => spec.matches(requirement));
    let best: VersionSpec | undefined;
    for (const candidate of candidates) {
      if (!best || VersionSpec.compare(candidate, best) > 0) {
        best = candidate;
      }
    }
    return best;
  }
}
