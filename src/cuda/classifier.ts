export type CudaFlagSet = ReadonlySet<string>;

export type DependencyClosure = {
  classType: string;
  dependencies: readonly string[];
};

/**
 * Node classes whose dependency closure contains a declared CUDA package.
 * Names must match exactly.
 */
export function classifyCudaNodes(packages: readonly string[], closures: Iterable<DependencyClosure>): Set<string> {
  const declared = new Set(packages);
  const flagged = new Set<string>();
  for (const closure of closures) {
    if (closure.dependencies.some((dep) => declared.has(dep))) flagged.add(closure.classType);
  }
  return flagged;
}

/** Memoises classification for the lifetime of a run. */
export class CudaClassifier {
  private readonly cache = new Map<string, CudaFlagSet>();

  classify(packages: readonly string[], closures: readonly DependencyClosure[]): CudaFlagSet {
    const key = cacheKey(packages, closures);
    const cached = this.cache.get(key);
    if (cached) return cached;

    const result: CudaFlagSet = classifyCudaNodes(packages, closures);
    this.cache.set(key, result);
    return result;
  }

  get size(): number {
    return this.cache.size;
  }
}

function cacheKey(packages: readonly string[], closures: readonly DependencyClosure[]): string {
  const normalized = closures
    .map((c) => [c.classType, [...c.dependencies].sort()] as const)
    .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  return JSON.stringify([[...packages].sort(), normalized]);
}
