export { SynthesisCoordinator } from './synthesis-coordinator.service';
