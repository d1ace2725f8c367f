export { Invoker, type InvokerOptions } from './invoker';
export {
  createInvocationRequest,
  isSuccess,
  type InvocationError,
  type InvocationFailure,
  type InvocationRequest,
  type InvocationResult,
  type InvocationSuccess,
} from './types';
