export * from './capture/frame-capture-driver.js';
export * from './cleanup/cleanup-coordinator.js';
export * from './cleanup/scene-lease.js';
export * from './encoding/image-encoder.js';
export * from './sprite-sheet-export.service.js';
export * from './storage/temp-frame-store.js';
export * from './three/three-animation-system.js';
