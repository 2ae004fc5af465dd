// lib/newick.ts
import { ArgumentError, ParseError, failed, parsed, type Parsed } from "./errors";
import { parseAttributes, type Annotation } from "./newick-attributes";
import { NOT_FOUND, extractEscaped, skipSpaces } from "./newick-scan";

export type { Annotation } from "./newick-attributes";

export type LeafNode = {
  kind: "leaf";
  label: string;
  /** Length of the edge to the parent; absent when no `:<number>` was given */
  branchLength?: number;
  annotations: Annotation[];
};

export type InternalNode = {
  kind: "internal";
  label: "";
  branchLength?: number;
  /** Indices of the children in the same array, all lower than this node's own */
  children: number[];
  annotations: Annotation[];
};

export type FlatNode = LeafNode | InternalNode;

/** Post-order node array; the last element is the root. */
export type FlatTree = readonly FlatNode[];

/**
 * What to do with text left after the root subtree:
 * "reject" allows only whitespace and one ';', "ignore" leaves it unread.
 */
export type TrailingPolicy = "reject" | "ignore";

export type ParseOptions = {
  trailing: TrailingPolicy;
  allowSingleChild: boolean;
  maxDepth: number;
};

/** Highest accepted `maxDepth`; the parser recurses once per level. */
export const MAX_DEPTH_LIMIT = 2000;

export const DEFAULT_PARSE_OPTIONS: Readonly<ParseOptions> = {
  trailing: "reject",
  allowSingleChild: true,
  maxDepth: 1000,
};

export type ParseResult =
  | { ok: true; tree: FlatTree; consumed: number }
  | { ok: false; error: ParseError };

/** Ensure Newick ends with a single trailing semicolon. */
export function ensureSemicolon(s: string): string {
  const t = (s ?? "").trim();
  if (!t) return "";
  return t.endsWith(";") ? t : `${t};`;
}

const LABEL_STOPS = /[\s:\[,()\]]/;
const NUMERAL = /[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y;

/** Appends nodes for one parse. Dropped wholesale when the parse fails. */
class NodeBuilder {
  private readonly nodes: FlatNode[] = [];

  append(node: FlatNode): number {
    this.nodes.push(node);
    return this.nodes.length - 1;
  }

  finish(): FlatTree {
    return this.nodes;
  }
}

type Step = Parsed<{ consumed: number; index: number }>;

/**
 * Parse Newick text with `[&name=value,...]` annotations into a flat node
 * array. Never returns a partial tree: on any fault the result carries one
 * ParseError and the nodes built so far are discarded. Invalid options
 * throw ArgumentError.
 */
export function tryParseNewick(input: string, options: Partial<ParseOptions> = {}): ParseResult {
  const opts: ParseOptions = { ...DEFAULT_PARSE_OPTIONS, ...options };
  if (!Number.isInteger(opts.maxDepth) || opts.maxDepth < 1 || opts.maxDepth > MAX_DEPTH_LIMIT) {
    throw new ArgumentError(`maxDepth must be an integer in 1..${MAX_DEPTH_LIMIT}, got ${opts.maxDepth}`);
  }
  const s = input;
  if (!s.trim()) return failed("Empty Newick", 0);

  const builder = new NodeBuilder();

  function readBranch(at: number): Parsed<{ consumed: number; length: number }> {
    const i = at + skipSpaces(s, at);
    NUMERAL.lastIndex = i;
    const m = NUMERAL.exec(s);
    if (!m) return failed("Malformed branch length", i);
    const length = Number(m[0]);
    if (!Number.isFinite(length)) return failed(`Branch length '${m[0]}' is not finite`, i);
    return parsed({ consumed: i + m[0].length - at, length });
  }

  function subtree(at: number, depth: number): Step {
    if (depth > opts.maxDepth) return failed(`Tree nested deeper than ${opts.maxDepth} levels`, at);

    let i = at + skipSpaces(s, at);
    let children: number[] | null = null;
    let label = "";

    if (s[i] === "(") {
      i++; // consume '('
      if (s[i + skipSpaces(s, i)] === ")") return failed("Empty child list", i);
      children = [];
      for (;;) {
        const child = subtree(i, depth + 1);
        if (!child.ok) return child;
        i += child.value.consumed;
        children.push(child.value.index);

        i += skipSpaces(s, i);
        if (s[i] === ",") {
          i++; // next child
          continue;
        }
        if (s[i] === ")") {
          i++; // end children
          break;
        }
        if (i >= s.length) return failed("Unclosed '('", i);
        return failed(`Expected ',' or ')' but found '${s[i]}'`, i);
      }
      if (children.length === 1 && !opts.allowSingleChild) {
        return failed("Internal node with a single child", at);
      }
    } else {
      const start = i;
      while (i < s.length && !LABEL_STOPS.test(s[i])) i++;
      label = s.slice(start, i);
    }

    i += skipSpaces(s, i);
    const annotations: Annotation[] = [];
    while (s[i] === "[") {
      if (s[i + 1] === "&") {
        const attrs = parseAttributes(s, i + 2);
        if (!attrs.ok) return attrs;
        annotations.push(...attrs.value.entries);
        i += 2 + attrs.value.consumed;
      } else {
        // plain comment; a ']' inside needs a backslash
        const e = extractEscaped(s, "]", i + 1);
        if (e === NOT_FOUND) return failed("Unterminated comment", i);
        i += e + 2;
      }
      i += skipSpaces(s, i);
    }

    let branchLength: number | undefined;
    if (s[i] === ":") {
      const branch = readBranch(i + 1);
      if (!branch.ok) return branch;
      branchLength = branch.value.length;
      i += 1 + branch.value.consumed;
    }

    const node: FlatNode = children
      ? { kind: "internal", label: "", children, annotations }
      : { kind: "leaf", label, annotations };
    if (branchLength !== undefined) node.branchLength = branchLength;

    return parsed({ consumed: i - at, index: builder.append(node) });
  }

  const root = subtree(0, 0);
  if (!root.ok) return root;

  let end = root.value.consumed;
  if (opts.trailing === "reject") {
    end += skipSpaces(s, end);
    if (s[end] === ";") end++;
    end += skipSpaces(s, end);
    if (end < s.length) {
      return failed(`Extraneous characters at tree end: '${s.slice(end, end + 5)}'`, end);
    }
  }
  return { ok: true, tree: builder.finish(), consumed: end };
}

/** Like tryParseNewick(), but throws the ParseError. */
export function parseNewick(input: string, options: Partial<ParseOptions> = {}): FlatTree {
  const res = tryParseNewick(input, options);
  if (!res.ok) throw res.error;
  return res.tree;
}
