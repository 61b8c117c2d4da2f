export { InteractionTriggerService, interactionTrigger } from './interaction-trigger.service';
