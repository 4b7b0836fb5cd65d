export * from './tool.js';
export * from './message.js';
export * from './error.js';
export * from './event.js';
export * from './session.js';
