export * from './types.js';
export { LineWriter, bufferText, createCaptureBuffer } from './buffer.js';
export { CaptureHarness, type CaptureHarnessOptions } from './harness.js';
