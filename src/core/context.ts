import type { EnginePlatform } from '../types/engine';
import { loadConfig, type EngineManagerConfig } from '../utils/config';
import { DefaultArchiveExtractor, type ArchiveExtractor } from './archive-extractor';
import { EngineStore } from './engine-store';
import { HttpTransport } from './http-transport';
import { InstallPipeline } from './install-pipeline';
import { Launcher, type ProcessSpawner } from './launcher';
import { PlatformResolver } from './platform-resolver';
import { GitHubReleaseIndex, type ReleaseIndex } from './release-index';
import { ReleaseLocator } from './release-locator';
import { StoreLayout } from './store-layout';

/**
 * Collaborators that can be swapped out, mainly for tests.
 */
export interface ContextOverrides {
  platform?: EnginePlatform;
  transport?: HttpTransport;
  index?: ReleaseIndex;
  extractor?: ArchiveExtractor;
  spawn?: ProcessSpawner;
}

export interface EngineManagerContext {
  config: EngineManagerConfig;
  platform: EnginePlatform;
  layout: StoreLayout;
  store: EngineStore;
  transport: HttpTransport;
  index: ReleaseIndex;
  locator: ReleaseLocator;
  pipeline: InstallPipeline;
  launcher: Launcher;
}

/**
 * Wire every component for one invocation. The platform is resolved once here and passed down as a value.
 */
export function createContext(
  config: EngineManagerConfig = loadConfig(),
  overrides: ContextOverrides = {}
): EngineManagerContext {
  const platform = overrides.platform ?? PlatformResolver.resolve();
  const layout = new StoreLayout({
    dataDir: config.dataDir,
    cacheDir: config.cacheDir,
    platform,
    binaryPrefix: config.binaryPrefix,
  });
  const store = new EngineStore(layout);
  const transport = overrides.transport ?? new HttpTransport({
    userAgent: config.userAgent,
    token: config.githubToken,
  });
  const index = overrides.index ?? new GitHubReleaseIndex(transport, {
    apiUrl: config.githubApiUrl,
    repo: config.releaseRepo,
  });
  const locator = new ReleaseLocator(index, layout);
  const pipeline = new InstallPipeline({
    layout,
    store,
    locator,
    transport,
    extractor: overrides.extractor ?? new DefaultArchiveExtractor(),
  });
  const launcher = new Launcher(layout, overrides.spawn);

  return { config, platform, layout, store, transport, index, locator, pipeline, launcher };
}
