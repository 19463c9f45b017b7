// Analysis exports
export { countInversions, isSolvable } from './Solvability';
