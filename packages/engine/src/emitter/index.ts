import type {
  FileDescriptor,
  GeneratedFile,
  GeneratorConfig,
  ServiceDescriptor,
  Target,
  TargetRenderer,
} from '../types.js';
import { createSelector, selectServices } from '../selector/index.js';
import { buildManagerPlan } from '../plan/index.js';
import { ERRORS } from '../errors.js';
import { goRenderer } from './go-renderer.js';
import { tsRenderer } from './ts-renderer.js';

export { goRenderer } from './go-renderer.js';
export { tsRenderer } from './ts-renderer.js';

const RENDERERS: Record<Target, TargetRenderer> = {
  go: goRenderer,
  ts: tsRenderer,
};

export function getRenderer(target: string): TargetRenderer {
  if (target === 'go' || target === 'ts') return RENDERERS[target];
  throw ERRORS.UNKNOWN_TARGET(target);
}

/**
 * Candidate services of a file under the target's identifiers: a Go service
 * "order_cache" is "OrderCache" and qualifies for the "Cache" suffix.
 */
export function candidateServices(file: FileDescriptor, config: GeneratorConfig): ServiceDescriptor[] {
  const renderer = getRenderer(config.target);
  const named = { ...file, services: file.services.map(service => renderer.nameService(service)) };
  return selectServices(named, createSelector(config.suffix));
}

/**
 * Generate the cache manager source for one file.
 * Returns undefined when the file declares no candidate service.
 */
export function generateFile(file: FileDescriptor, config: GeneratorConfig): GeneratedFile | undefined {
  const services = candidateServices(file, config);
  if (services.length === 0) return undefined;

  const renderer = getRenderer(config.target);
  const plans = services.map(buildManagerPlan);

  return {
    name: renderer.fileName(file, config),
    content: renderer.render(file, plans, config),
  };
}

/**
 * Generate every file flagged for generation, in request order.
 * The first failing file aborts the whole run.
 */
export function generateFiles(files: ReadonlyArray<FileDescriptor>, config: GeneratorConfig): GeneratedFile[] {
  const out: GeneratedFile[] = [];

  for (const file of files) {
    if (!file.generate) continue;

    let generated: GeneratedFile | undefined;
    try {
      generated = generateFile(file, config);
    } catch (err) {
      throw ERRORS.GENERATION_FAILED(file.name, err);
    }

    if (generated) out.push(generated);
  }

  return out;
}
