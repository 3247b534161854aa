export { PathfindingService } from './pathfinding-service';
export type {
  FixRequest,
  GenerateAndFixRequest,
  GenerationRequest,
  GridRun,
  PathfindingServiceDeps,
} from './pathfinding-service';
