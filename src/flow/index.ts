export { FlowController, type FlowControllerOptions } from './flow-controller.js';
export {
  FlowControllerKind,
  InputSet,
  type FlowStep,
  type FlowStepKind,
  type GroupState,
  type SyncTag,
} from './types.js';
