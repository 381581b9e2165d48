import { Layer } from 'effect';
import {
  CrawlerConfig,
  type CrawlerConfigOptions,
  type CrawlerConfigService,
} from './Config/CrawlerConfig.service.js';
import { JobCoordinatorService } from './Jobs/JobCoordinator.service.js';
import { CrawlerLogger, CrawlerLoggerLive } from './Logging/CrawlerLogger.service.js';
import { MaintenanceService } from './Maintenance/Maintenance.service.js';
import { CrawlOrchestratorService } from './Orchestrator/CrawlOrchestrator.service.js';
import { CrawlStore } from './Store/CrawlStore.js';
import { InMemoryCrawlStore } from './Store/InMemoryCrawlStore.js';

/**
 * Replacements for the ambient services of a crawler layer.
 *
 * @group Layers
 * @public
 */
export interface CrawlerLayerOverrides {
  /** Defaults to the JSONL file logger */
  readonly logger?: Layer.Layer<CrawlerLogger>;
  /** Defaults to a fresh in-memory store */
  readonly store?: Layer.Layer<CrawlStore>;
}

/**
 * The crawl pipeline alone, without jobs or persistence.
 *
 * @group Layers
 * @public
 */
export const makePipelineLayer = (
  options: Partial<CrawlerConfigOptions> | CrawlerConfigService = {},
  logger: Layer.Layer<CrawlerLogger> = CrawlerLoggerLive
) =>
  CrawlOrchestratorService.Default.pipe(
    Layer.provideMerge(Layer.mergeAll(CrawlerConfig.Live(options), logger))
  );

/**
 * Everything: pipeline, job coordinator and maintenance tasks over one
 * store. The ambient services stay visible to the program as well.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const jobs = yield* JobCoordinatorService;
 *   const jobId = yield* jobs.submitBatch({ name: 'docs', urls });
 *   return yield* jobs.awaitJob(jobId);
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(makeCrawlerLayer({ maxConcurrentAttempts: 2 })))
 * );
 * ```
 *
 * @group Layers
 * @public
 */
export const makeCrawlerLayer = (
  options: Partial<CrawlerConfigOptions> | CrawlerConfigService = {},
  overrides: CrawlerLayerOverrides = {}
) => {
  const base = Layer.mergeAll(
    CrawlerConfig.Live(options),
    overrides.logger ?? CrawlerLoggerLive,
    overrides.store ?? InMemoryCrawlStore.layer()
  );
  const coordinator = JobCoordinatorService.Default.pipe(Layer.provideMerge(base));
  return MaintenanceService.Default.pipe(Layer.provideMerge(coordinator));
};
