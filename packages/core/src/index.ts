export * from './utils/bit.js';
export * from './errors.js';
export * from './cpu/cop0.js';
export * from './cpu/registers.js';
export * from './cpu/instruction.js';
export * from './cpu/pipeline.js';
export * from './cpu/fetch.js';
export * from './cpu/cpu.js';
export * from './mem/bus.js';
export * from './mem/rdram.js';
export * from './rom/byteorder.js';
export * from './rom/header.js';
export * from './rom/loader.js';
export * from './system/config.js';
export * from './system/system.js';
export * from './system/frame_loop.js';
