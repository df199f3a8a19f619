/**
 * Activations: persistent scopes mapping identifiers to variable cells.
 *
 * The mapping is a hash array mapped trie. `extend` copies only the path to
 * the changed leaf, so an Activation captured by a closure is never affected
 * by later extensions of it or of its parent.
 */
import type { Span } from "./ast.js";
import { InterpretationError, UnreachableError } from "./errors.js";
import type { Value } from "./values.js";

// --- Variables ---
type Slot =
  | { state: "uninitialized" }
  | { state: "bound"; value: Value }
  | { state: "moved"; movedAt?: Span };

export class Variable {
  readonly name: string;
  readonly isConstant: boolean;
  private slot: Slot;

  constructor(name: string, value?: Value, isConstant = false) {
    this.name = name;
    this.isConstant = isConstant;
    this.slot = value === undefined ? { state: "uninitialized" } : { state: "bound", value };
  }

  get isMoved(): boolean {
    return this.slot.state === "moved";
  }

  get isBound(): boolean {
    return this.slot.state === "bound";
  }

  /** The bound value, or undefined when uninitialized or moved. */
  peek(): Value | undefined {
    return this.slot.state === "bound" ? this.slot.value : undefined;
  }

  read(span?: Span): Value {
    switch (this.slot.state) {
      case "bound":
        return this.slot.value;
      case "moved":
        throw new InterpretationError(
          "E_USE_AFTER_MOVE",
          `'${this.name}' was moved and can no longer be used.`,
          span,
          { variable: this.name }
        );
      case "uninitialized":
        throw new UnreachableError(`'${this.name}' read before initialization`, span);
    }
  }

  write(value: Value): void {
    this.slot = { state: "bound", value };
  }

  /** Take the value out of the cell, leaving a moved slot behind. */
  moveOut(span?: Span): Value {
    const value = this.read(span);
    this.slot = { state: "moved", movedAt: span };
    return value;
  }
}

// --- Trie ---
const BITS = 5;
const MASK = (1 << BITS) - 1;

interface Leaf<V> {
  readonly kind: "leaf";
  readonly hash: number;
  readonly key: string;
  readonly value: V;
}

interface Collision<V> {
  readonly kind: "collision";
  readonly hash: number;
  readonly leaves: ReadonlyArray<Leaf<V>>;
}

interface Branch<V> {
  readonly kind: "branch";
  readonly bitmap: number;
  readonly children: ReadonlyArray<TrieNode<V>>;
}

type TrieNode<V> = Leaf<V> | Collision<V> | Branch<V>;

/** 32-bit FNV-1a */
function hashString(key: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < key.length; i++) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

function popcount(x: number): number {
  x = x - ((x >>> 1) & 0x55555555);
  x = (x & 0x33333333) + ((x >>> 2) & 0x33333333);
  x = (x + (x >>> 4)) & 0x0f0f0f0f;
  return Math.imul(x, 0x01010101) >>> 24;
}

function fragment(hash: number, shift: number): number {
  return (hash >>> shift) & MASK;
}

function lookup<V>(node: TrieNode<V>, hash: number, key: string, shift: number): V | undefined {
  switch (node.kind) {
    case "leaf":
      return node.key === key ? node.value : undefined;
    case "collision":
      return node.hash === hash ? node.leaves.find((leaf) => leaf.key === key)?.value : undefined;
    case "branch": {
      const bit = 1 << fragment(hash, shift);
      if ((node.bitmap & bit) === 0) return undefined;
      const child = node.children[popcount(node.bitmap & (bit - 1))];
      return child === undefined ? undefined : lookup(child, hash, key, shift + BITS);
    }
  }
}

// Two nodes with distinct hashes always separate by shift 30, the last
// level that still reads hash bits.
function merge<V>(a: Leaf<V> | Collision<V>, b: Leaf<V>, shift: number): TrieNode<V> {
  if (a.hash === b.hash) {
    return a.kind === "collision"
      ? { kind: "collision", hash: a.hash, leaves: [...a.leaves, b] }
      : { kind: "collision", hash: a.hash, leaves: [a, b] };
  }
  const fa = fragment(a.hash, shift);
  const fb = fragment(b.hash, shift);
  if (fa === fb) {
    return { kind: "branch", bitmap: 1 << fa, children: [merge(a, b, shift + BITS)] };
  }
  return {
    kind: "branch",
    bitmap: (1 << fa) | (1 << fb),
    children: fa < fb ? [a, b] : [b, a],
  };
}

function insert<V>(node: TrieNode<V>, leaf: Leaf<V>, shift: number): TrieNode<V> {
  switch (node.kind) {
    case "leaf":
      return node.key === leaf.key ? leaf : merge(node, leaf, shift);
    case "collision": {
      if (node.hash !== leaf.hash) return merge(node, leaf, shift);
      const index = node.leaves.findIndex((existing) => existing.key === leaf.key);
      const leaves = [...node.leaves];
      if (index >= 0) {
        leaves[index] = leaf;
      } else {
        leaves.push(leaf);
      }
      return { kind: "collision", hash: node.hash, leaves };
    }
    case "branch": {
      const bit = 1 << fragment(leaf.hash, shift);
      const index = popcount(node.bitmap & (bit - 1));
      const children = [...node.children];
      const child = children[index];
      if ((node.bitmap & bit) === 0 || child === undefined) {
        children.splice(index, 0, leaf);
        return { kind: "branch", bitmap: node.bitmap | bit, children };
      }
      children[index] = insert(child, leaf, shift + BITS);
      return { kind: "branch", bitmap: node.bitmap, children };
    }
  }
}

function collectKeys<V>(node: TrieNode<V>, out: string[]): void {
  switch (node.kind) {
    case "leaf":
      out.push(node.key);
      return;
    case "collision":
      for (const leaf of node.leaves) out.push(leaf.key);
      return;
    case "branch":
      for (const child of node.children) collectKeys(child, out);
      return;
  }
}

// --- Activation ---
export class Activation {
  static readonly empty = new Activation(undefined, 0);

  private readonly root: TrieNode<Variable> | undefined;
  readonly size: number;

  private constructor(root: TrieNode<Variable> | undefined, size: number) {
    this.root = root;
    this.size = size;
  }

  find(name: string): Variable | undefined {
    if (!this.root) return undefined;
    return lookup(this.root, hashString(name), name, 0);
  }

  has(name: string): boolean {
    return this.find(name) !== undefined;
  }

  /** A new Activation with `name` bound to `variable`; this one is unchanged. */
  extend(name: string, variable: Variable): Activation {
    const leaf: Leaf<Variable> = { kind: "leaf", hash: hashString(name), key: name, value: variable };
    const size = this.has(name) ? this.size : this.size + 1;
    return new Activation(this.root ? insert(this.root, leaf, 0) : leaf, size);
  }

  /** Bound names, sorted. */
  names(): string[] {
    const out: string[] = [];
    if (this.root) collectKeys(this.root, out);
    return out.sort();
  }
}
