export {
  tokenizeMoves,
  commonPrefixLength,
  longestCommonPrefix,
  chunkTokens,
  sanitizePgnMoves,
} from './tokens';
