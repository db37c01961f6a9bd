export {
  branch,
  buildTree,
  END_TOKEN,
  MAX_EXAMPLE_NAMES,
  type BranchNode,
  type BranchTreeNode,
  type OpeningTree,
} from './opening-tree';
export { longestCommonPrefix } from '../moves';
