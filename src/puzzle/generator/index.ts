// Generator exports
export { scrambleBoard } from './Scrambler';
