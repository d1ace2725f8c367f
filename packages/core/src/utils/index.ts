export { combineSignals, type CombinedSignal } from './signals';
export { createSemaphore, type Semaphore } from './semaphore';
