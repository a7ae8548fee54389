export * from './types.js';
export { FlowControl } from './flow.js';
export { CONTRACT_PREFIX, parseDirective, encodeDirective } from './contract.js';
export { applyEnvDirective } from './env.js';
export { defaultMiddleware, replayCapture, takeImplementationArgs } from './default.js';
export {
    contractMiddleware,
    createContractMiddleware,
    type ContractMiddlewareOptions,
} from './contract-middleware.js';
