export { SandboxExecutor, type SandboxOptions } from './sandbox-executor';
export { sanitizePoints, isSafePoint, samePoint } from './sanitizer';
