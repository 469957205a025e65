export { AsyncAutoResetEvent } from './AsyncAutoResetEvent';
export { AsyncEventWaitHandle } from './AsyncEventWaitHandle';
export { AsyncManualResetEvent } from './AsyncManualResetEvent';
export { AsyncTimerEvent } from './AsyncTimerEvent';
