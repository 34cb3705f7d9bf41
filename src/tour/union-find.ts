/**
 * Union-Find (Disjoint Set) with path compression and union by rank.
 * Used to reject cycle-closing edges while building the spanning tree.
 */

/**
 * Disjoint-set forest over the elements 0..n-1.
 * Indices are not bounds-checked.
 */
export class UnionFind {
  private parent: number[];
  private rank: number[];
  private componentSize: number[];
  private numComponents: number;

  /**
   * Create a new Union-Find structure.
   * @param n Number of elements (0 to n-1).
   */
  constructor(n: number) {
    this.parent = new Array<number>(n);
    this.rank = new Array<number>(n);
    this.componentSize = new Array<number>(n);
    this.numComponents = n;

    for (let i = 0; i < n; i++) {
      this.parent[i] = i;
      this.rank[i] = 0;
      this.componentSize[i] = 1;
    }
  }

  /**
   * Find the root of the set containing element x.
   * Every node on the path is repointed at the root.
   */
  find(x: number): number {
    let root = x;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }

    // Path compression
    let node = x;
    while (this.parent[node] !== root) {
      const next = this.parent[node];
      this.parent[node] = root;
      node = next;
    }

    return root;
  }

  /**
   * Union the sets containing elements x and y.
   * The lower-rank root goes under the higher-rank one; on equal rank the
   * root of y goes under the root of x and x's rank grows.
   * Returns the root of the merged set, or -1 if already in same set.
   */
  union(x: number, y: number): number {
    const rootX = this.find(x);
    const rootY = this.find(y);

    if (rootX === rootY) {
      return -1;
    }

    this.numComponents--;

    if (this.rank[rootX] < this.rank[rootY]) {
      this.parent[rootX] = rootY;
      this.componentSize[rootY] += this.componentSize[rootX];
      return rootY;
    } else if (this.rank[rootX] > this.rank[rootY]) {
      this.parent[rootY] = rootX;
      this.componentSize[rootX] += this.componentSize[rootY];
      return rootX;
    } else {
      this.parent[rootY] = rootX;
      this.componentSize[rootX] += this.componentSize[rootY];
      this.rank[rootX]++;
      return rootX;
    }
  }

  /**
   * Check if two elements are in the same set.
   */
  connected(x: number, y: number): boolean {
    return this.find(x) === this.find(y);
  }

  /**
   * Get the size of the component containing element x.
   */
  getSize(x: number): number {
    return this.componentSize[this.find(x)];
  }

  /**
   * Get the number of disjoint components.
   */
  getNumComponents(): number {
    return this.numComponents;
  }

  /**
   * Rank of the tree rooted at x's root. Bounded by log2(n).
   */
  getRank(x: number): number {
    return this.rank[this.find(x)];
  }
}
