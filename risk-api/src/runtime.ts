import type { Pool } from 'pg';
import { createPool } from './db/pool.js';
import { HybridRiskPipeline } from './domains/risk/pipeline.js';
import type { AppConfig } from './lib/config.js';
import { loadStudentDataset } from './lib/dataset.js';
import type { BaseLogger } from './lib/logger.js';
import { FileModelStore, PgModelStore, type ModelStore } from './lib/model-store.js';

export type Runtime = {
  pipeline: HybridRiskPipeline;
  hasGroundTruth: boolean;
  close: () => Promise<void>;
};

function createModelStore(config: AppConfig): { store: ModelStore; pool: Pool | null } {
  if (config.modelStore === 'postgres' && config.databaseUrl) {
    const pool = createPool(config.databaseUrl);
    return { store: new PgModelStore(pool, config.modelName), pool };
  }
  return { store: new FileModelStore(config.modelPath), pool: null };
}

export async function startRuntime(
  config: AppConfig,
  logger: BaseLogger,
  options: { trainNewModel?: boolean } = {}
): Promise<Runtime> {
  const { store, pool } = createModelStore(config);
  const close = async () => {
    await pool?.end();
  };

  try {
    const table = await loadStudentDataset(config.datasetPath);
    logger.info({ path: config.datasetPath, delimiter: table.delimiter, records: table.records.length }, 'dataset.loaded');

    const pipeline = new HybridRiskPipeline({ store, logger });
    await pipeline.run(table.records, { trainNewModel: options.trainNewModel ?? config.trainNewModel });

    return { pipeline, hasGroundTruth: table.headers.includes('G3'), close };
  } catch (err) {
    await close();
    throw err;
  }
}
