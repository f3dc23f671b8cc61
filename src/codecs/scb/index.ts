export { readScb, type StaticMeshReadOptions } from './scb-codec';
export { readSco } from './sco-codec';
