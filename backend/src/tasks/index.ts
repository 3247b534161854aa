export { TaskManager, estimateRemaining, toTaskFailure } from './task-manager';
export type { TaskContext, TaskHandler, TaskListener, TaskManagerOptions } from './task-manager';
