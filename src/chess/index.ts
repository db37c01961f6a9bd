export {
  START_FEN,
  startPosition,
  nextPly,
  sideToMove,
  applyMove,
  playLine,
  parseFen,
  type PlayedLine,
} from './board';
export { addOpening, validateLine } from './add-opening';
