/**
 * Algorithm Registry
 *
 * In-memory library of named custom algorithms. A save must carry either a
 * passing validation report or an explicit override; the registry itself does
 * not re-validate. Writes are serialized per name.
 */

import type {
  AlgorithmSummary,
  CustomAlgorithm,
  SaveAlgorithmInput,
} from '@pathforge/shared-types';
import { ConflictError, NotFoundError, ValidationError } from '../errors';
import { createLogger } from '../logging/log';
import { KeyedMutex } from './keyed-mutex';

const log = createLogger('registry');

export class AlgorithmRegistry {
  private readonly entries = new Map<string, CustomAlgorithm>();
  private readonly mutex = new KeyedMutex();

  list(): AlgorithmSummary[] {
    return [...this.entries.values()]
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.name.localeCompare(b.name))
      .map(({ name, description, createdAt }) => ({ name, description, createdAt }));
  }

  get(name: string): CustomAlgorithm {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new NotFoundError(`Algorithm "${name}" not found`);
    }
    return { ...entry };
  }

  getSource(name: string): string {
    return this.get(name).code;
  }

  getDescription(name: string): string {
    return this.get(name).description;
  }

  /**
   * Create an entry, or rename/update one when previousName is given
   */
  async save(input: SaveAlgorithmInput): Promise<CustomAlgorithm> {
    const name = input.name.trim();
    if (name.length === 0) {
      throw new ValidationError('Algorithm name must not be empty');
    }
    if (input.acceptance.kind === 'validated' && !input.acceptance.report.isValid) {
      throw new ValidationError(
        `Algorithm "${name}" has ${input.acceptance.report.errorCount} validation error(s); save with an override to keep it anyway`,
        input.acceptance.report
      );
    }

    const previousName = input.previousName?.trim();
    const keys = previousName ? [name, previousName] : [name];

    return this.mutex.runExclusive(keys, () => {
      const now = new Date().toISOString();
      const acceptedBy = input.acceptance.kind === 'validated' ? 'validation' : 'override';

      if (previousName === undefined) {
        if (this.entries.has(name)) {
          throw new ConflictError(`Algorithm "${name}" already exists`);
        }
        const created: CustomAlgorithm = {
          name,
          description: input.description,
          code: input.code,
          createdAt: now,
          updatedAt: now,
          acceptedBy,
        };
        this.entries.set(name, created);
        log.info('Algorithm saved', { name, acceptedBy });
        return { ...created };
      }

      const existing = this.entries.get(previousName);
      if (!existing) {
        throw new NotFoundError(`Algorithm "${previousName}" not found`);
      }
      if (name !== previousName && this.entries.has(name)) {
        throw new ConflictError(`Cannot rename "${previousName}" to "${name}": name already taken`);
      }

      const updated: CustomAlgorithm = {
        ...existing,
        name,
        description: input.description,
        code: input.code,
        updatedAt: now,
        acceptedBy,
      };
      this.entries.delete(previousName);
      this.entries.set(name, updated);
      log.info('Algorithm updated', { name, previousName });
      return { ...updated };
    });
  }

  async delete(name: string): Promise<void> {
    await this.mutex.runExclusive([name], () => {
      if (!this.entries.delete(name)) {
        throw new NotFoundError(`Algorithm "${name}" not found`);
      }
      log.info('Algorithm deleted', { name });
    });
  }
}
