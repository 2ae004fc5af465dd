// lib/index.ts
export { ParseError, ArgumentError, errorMessage } from "./errors";
export { NOT_FOUND, skipSpaces, containsChar, findIndex, extractEscaped } from "./newick-scan";
export { parseAttributes, type Annotation, type AttributeList } from "./newick-attributes";
export {
  parseNewick,
  tryParseNewick,
  ensureSemicolon,
  DEFAULT_PARSE_OPTIONS,
  MAX_DEPTH_LIMIT,
  type FlatNode,
  type FlatTree,
  type LeafNode,
  type InternalNode,
  type ParseOptions,
  type ParseResult,
  type TrailingPolicy,
} from "./newick";
export {
  rootIndex,
  isLeaf,
  validateFlatTree,
  postOrder,
  preOrder,
  clade,
  taxa,
  parentIndices,
  nodeHeights,
  treeHeight,
  toNested,
  type NwNode,
} from "./flat-tree";
export { layoutUnrooted, type LayoutOptions, type LayoutPoint, type LayoutEdge, type UnrootedLayout } from "./unrooted-layout";
export { demographicPopulation, demographicIntegral } from "./demography";
export { evolveSequence, hamming, minPairwiseDistance, type NucCode, type SubstitutionMatrix } from "./sequences";
export { nonEmptyIntersection } from "./masks";
export { loadConfig, loadParseOptions, parseDatabaseUrl, type Config, type DbConfig } from "./config";
export { query, getPool, closePool, type QueryFn, type SQLParam } from "./db";
export {
  createTreeStore,
  normalizeTreeInput,
  describeTree,
  edgeList,
  normalizeEdgeList,
  type TreeStore,
  type TreeRow,
  type TreeInput,
  type TreeSummary,
  type Edge,
} from "./tree-store";
