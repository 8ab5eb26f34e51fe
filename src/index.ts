export * from './bodies';
export * from './constants';
export * from './errors';
export * from './frames/transform';
export * from './physics/celestial-body';
export * from './physics/conic';
export {
  canonicalizeElements,
  elementsToState,
  perifocalState,
  perifocalToInertial,
  stateToElements,
  wrapAngle,
} from './physics/orbital-elements';
export * from './physics/orbit';
export * from './physics/propagation';
export * from './precision';
export * from './scripting/orbit-schema';
export type * from './types';
export * from './ui/orbit-summary';
export * from './units';
