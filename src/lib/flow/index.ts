export {
  createInitialFlowState,
  transitionFlow,
  type CompletionReason,
  type FlowEffect,
  type FlowEvent,
  type FlowState,
  type FlowStatus,
  type FlowTransition,
} from './flowMachine';

export { selectBundle } from './mediaBundle';
