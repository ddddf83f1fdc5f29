import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { ClassifierModel } from '../domains/risk/contracts.js';
import { PersistenceError } from './errors.js';
import { ClassifierModelSchema } from './schemas.js';

export type ModelHandle = string;

export interface ModelStore {
  readonly defaultHandle: ModelHandle;
  save(model: ClassifierModel): Promise<ModelHandle>;
  load(handle: ModelHandle): Promise<ClassifierModel | null>;
}

export type Queryable = {
  query: (text: string, params?: unknown[]) => Promise<{ rows: unknown[]; rowCount: number | null }>;
};

function parseArtifact(raw: unknown, handle: ModelHandle) {
  const parsed = ClassifierModelSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PersistenceError(`Stored model "${handle}" is not a valid classifier artifact`, { cause: parsed.error });
  }
  return parsed.data;
}

function isMissingFile(err: unknown) {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileModelStore implements ModelStore {
  constructor(readonly defaultHandle: ModelHandle) {}

  async save(model: ClassifierModel) {
    try {
      await fs.mkdir(path.dirname(this.defaultHandle), { recursive: true });
      await fs.writeFile(this.defaultHandle, `${JSON.stringify(model, null, 2)}\n`, 'utf8');
    } catch (err) {
      throw new PersistenceError(`Could not write model to ${this.defaultHandle}`, { cause: err });
    }
    return this.defaultHandle;
  }

  async load(handle: ModelHandle) {
    let text: string;
    try {
      text = await fs.readFile(handle, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new PersistenceError(`Could not read model from ${handle}`, { cause: err });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new PersistenceError(`Model file ${handle} is not valid JSON`, { cause: err });
    }
    return parseArtifact(raw, handle);
  }
}

const StoredModelRowSchema = z.object({ artifact_json: z.unknown() });

export class PgModelStore implements ModelStore {
  constructor(private readonly client: Queryable, readonly defaultHandle: ModelHandle = 'default') {}

  async save(model: ClassifierModel) {
    try {
      await this.client.query(
        `insert into classifier_models (name, artifact_json, trained_at)
         values ($1, $2::jsonb, $3::timestamptz)
         on conflict (name) do update
           set artifact_json = excluded.artifact_json,
               trained_at = excluded.trained_at,
               updated_at = now()`,
        [this.defaultHandle, JSON.stringify(model), model.trainedAt]
      );
    } catch (err) {
      throw new PersistenceError(`Could not store model "${this.defaultHandle}"`, { cause: err });
    }
    return this.defaultHandle;
  }

  async load(handle: ModelHandle) {
    let rows: unknown[];
    try {
      const res = await this.client.query(
        `select artifact_json
         from classifier_models
         where name = $1`,
        [handle]
      );
      rows = res.rows;
    } catch (err) {
      throw new PersistenceError(`Could not load model "${handle}"`, { cause: err });
    }

    if (rows.length === 0) return null;
    const row = StoredModelRowSchema.safeParse(rows[0]);
    if (!row.success) {
      throw new PersistenceError(`Stored model "${handle}" has an unexpected row shape`, { cause: row.error });
    }
    return parseArtifact(row.data.artifact_json, handle);
  }
}
