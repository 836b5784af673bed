export {
  compilePattern,
  filterPods,
  type PodRecord,
  parsePodRecords,
  type ResolveOptions,
  type ResolverDeps,
  resolvePods,
} from './resolver.js';
