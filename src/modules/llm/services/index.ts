export { GenerationCoordinator } from './generation-coordinator.service';
