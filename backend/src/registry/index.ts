export { AlgorithmRegistry } from './algorithm-registry';
export { KeyedMutex } from './keyed-mutex';
