export * from './types.js';
export * from './errors.js';
export * from './classification.js';
export * from './contracts.js';
export * from './config.js';
export * from './lock.js';
export * from './image.js';
export * from './http/cors.js';
export * from './http/json.js';
export * from './http/serve.js';
export * from './http/client.js';
export * from './capture/types.js';
export * from './capture/local.js';
export * from './capture/remote.js';
export * from './capture/ffmpeg.js';
export * from './actuator/types.js';
export * from './actuator/local.js';
export * from './actuator/remote.js';
export * from './actuator/sysfs.js';
