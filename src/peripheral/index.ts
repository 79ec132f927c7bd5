export { PeripheralDriver } from './driver.js';
export type { PeripheralConfig, PhraseSpeaker } from './driver.js';
export { I2cRegisterBus } from './bus.js';
export type { RegisterBus } from './bus.js';
export * from './protocol.js';
