/**
 * @wirebound/core - Transport Module
 *
 * In-process transports for tests and examples
 */

export { EventTransport } from './EventTransport';
export type { ReplayEvent } from './EventTransport';
export { CaptureTransport } from './CaptureTransport';
