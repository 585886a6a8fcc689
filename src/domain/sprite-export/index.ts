export * from './contracts/animation-system.js';
export * from './contracts/scene-renderer.js';
export * from './contracts/sprite-export-service.js';
export * from './entities/export-job.js';
export * from './errors/export-error.js';
export * from './services/bounding-box-sampler.js';
export * from './services/camera-framing-planner.js';
export * from './services/frame-schedule.js';
export * from './services/grid-layout-solver.js';
export * from './services/output-naming.js';
export * from './services/sheet-composer.js';
export * from './value-objects/camera-plan.js';
export * from './value-objects/export-options.js';
export * from './value-objects/frame-buffer.js';
export * from './value-objects/geometry.js';
export * from './value-objects/grid-layout.js';
export * from './value-objects/time-sample.js';
