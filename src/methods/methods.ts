export { fitness } from './fitness';
export { selection } from './selection';
export { crossover } from './crossover';
export { mutation } from './mutation';
