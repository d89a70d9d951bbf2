/**
 * Playback infrastructure exports
 */

export { StreamResolver, DEFAULT_RETRY_POLICY } from './StreamResolver';
export type { StreamResolverOptions } from './StreamResolver';
export { IPCClient } from './IPCClient';
export { ProcessManager, buildMpvArgs } from './ProcessManager';
export type { ProcessManagerTimings } from './ProcessManager';
export { MpvPipeline } from './MpvPipeline';
export type { MpvPipelineOptions } from './MpvPipeline';
