// API exports for programmatic usage

// Core functionality
import { createContext } from './core/context';
import { EngineResolver } from './core/engine-resolver';
import { ProjectDetector } from './core/project-detector';
import { PlatformResolver } from './core/platform-resolver';
import { VersionSpec } from './core/version-spec';
import { StoreLayout } from './core/store-layout';
import { EngineStore } from './core/engine-store';
import { HttpTransport } from './core/http-transport';
import { GitHubReleaseIndex } from './core/release-index';
import { ReleaseLocator } from './core/release-locator';
import { DefaultArchiveExtractor, TarExtractor, ZipExtractor } from './core/archive-extractor';
import { InstallPipeline } from './core/install-pipeline';
import { Launcher } from './core/launcher';

// Utilities
import { Logger } from './utils/logger';
import { Validator } from './utils/validator';
import { FileSystem } from './utils/file-system';
import { Platform } from './utils/platform';
import { loadConfig } from './utils/config';

// Re-exports
export {
  createContext,
  EngineResolver,
  ProjectDetector,
  PlatformResolver,
  VersionSpec,
  StoreLayout,
  EngineStore,
  HttpTransport,
  GitHubReleaseIndex,
  ReleaseLocator,
  DefaultArchiveExtractor,
  TarExtractor,
  ZipExtractor,
  InstallPipeline,
  Launcher
};
export { Logger, Validator, FileSystem, Platform, loadConfig };
export * from './core/errors';
export type { EngineManagerContext, ContextOverrides } from './core/context';
export type { ArchiveExtractor } from './core/archive-extractor';
export type { ReleaseIndex } from './core/release-index';
export type { ProcessSpawner } from './core/launcher';
export type { EngineManagerConfig } from './utils/config';

// Types
export type * from './types/project';
export type * from './types/engine';
export type * from './types/release';
export type * from './types/install';

// Command functions (for programmatic usage)
import { listCommand } from './commands/list';
import { installCommand } from './commands/install';
import { uninstallCommand } from './commands/uninstall';
import { launchCommand } from './commands/launch';
import { editCommand } from './commands/edit';
import { showCommand } from './commands/show';
import { cacheCommand } from './commands/cache';

export { listCommand, installCommand, uninstallCommand, launchCommand, editCommand, showCommand, cacheCommand };

/**
 * Main API for programmatic usage
 */
export class EngineManagerAPI {
  static context = {
    create: createContext
  };

  static project = {
    detect: ProjectDetector.detectProject.bind(ProjectDetector)
  };

  static engine = {
    resolve: EngineResolver.resolveEngine.bind(EngineResolver),
    findInstalledFor: EngineResolver.findInstalledFor.bind(EngineResolver)
  };

  static version = {
    parse: VersionSpec.from.bind(VersionSpec)
  };

  static utils = {
    logger: Logger,
    validator: Validator,
    fileSystem: FileSystem,
    platform: Platform
  };
}

// Default export
export default EngineManagerAPI;
