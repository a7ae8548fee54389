export * from './types.js';
export {
    EXIT_SIGNAL,
    normalizeSignal,
    signalExitCode,
    toNodeSignal,
    createProcessSignalHost,
} from './host.js';
export { SignalRegistry, type SignalRegistryOptions } from './registry.js';
