// Token-level Aho-Corasick automaton for multi-term matching.
// Patterns and input are token arrays, so a term only ever matches whole tokens.

export interface TokenMatch<T> {
  pattern: string;
  start: number;
  end: number;
  data: T;
}

interface PatternOutput<T> {
  pattern: string;
  length: number;
  data: T;
}

class AhoCorasickNode<T> {
  children = new Map<string, AhoCorasickNode<T>>();
  failure: AhoCorasickNode<T> | null = null;
  /** Patterns ending exactly here */
  own: PatternOutput<T>[] = [];
  /** own plus everything reachable through failure links */
  output: PatternOutput<T>[] = [];
}

export class AhoCorasickAutomaton<T> {
  private root = new AhoCorasickNode<T>();
  private built = false;
  private patternCount = 0;

  /**
   * Add a pattern given as its tokens.
   */
  addPattern(tokens: readonly string[], data: T): void {
    if (tokens.length === 0) {
      return;
    }

    let node = this.root;
    for (const token of tokens) {
      let next = node.children.get(token);
      if (!next) {
        next = new AhoCorasickNode<T>();
        node.children.set(token, next);
      }
      node = next;
    }

    node.own.push({ pattern: tokens.join(' '), length: tokens.length, data });
    this.built = false;
    this.patternCount++;
  }

  // Failure links via BFS
  private build(): void {
    if (this.built) return;

    const queue: AhoCorasickNode<T>[] = [];
    for (const child of this.root.children.values()) {
      child.failure = this.root;
      child.output = [...child.own];
      queue.push(child);
    }

    let head = 0;
    while (head < queue.length) {
      const current = queue[head++];

      for (const [token, child] of current.children) {
        queue.push(child);

        let fallback = current.failure;
        while (fallback !== null && !fallback.children.has(token)) {
          fallback = fallback.failure;
        }

        const target = fallback?.children.get(token) ?? this.root;
        child.failure = target;
        child.output = target === this.root ? [...child.own] : [...child.own, ...target.output];
      }
    }

    this.built = true;
  }

  search(tokens: readonly string[]): TokenMatch<T>[] {
    this.build();

    const results: TokenMatch<T>[] = [];
    let current = this.root;

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];

      let next = current.children.get(token);
      while (!next && current.failure !== null) {
        current = current.failure;
        next = current.children.get(token);
      }
      if (!next) {
        current = this.root;
        continue;
      }

      current = next;
      for (const match of current.output) {
        results.push({
          pattern: match.pattern,
          start: i - match.length + 1,
          end: i,
          data: match.data
        });
      }
    }

    return results;
  }

  get size(): number {
    return this.patternCount;
  }
}
