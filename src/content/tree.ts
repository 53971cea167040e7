/**
 * Content tree
 *
 * The CMS page tree (and records placed on pages) exported as JSON. Used to
 * find the site a document belongs to and to enumerate the documents of a
 * site for bulk precomputation.
 *
 * File format:
 *   { "nodes": [ { "id": 1, "parentId": 0, "kind": "page", "type": "pages", "title": "Home" } ] }
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { SiteConfig } from '../config/schema.js';
import type { PartitionResolver } from '../backend/types.js';
import { RetrievalError, RetrievalErrorCode } from '../similarity/errors.js';
import { createDocumentRef, documentKey, type DocumentRef, type PartitionKey } from '../similarity/types.js';

/**
 * Content tree error codes
 */
export enum ContentTreeErrorCode {
  FILE_NOT_READABLE = 'FILE_NOT_READABLE',
  INVALID_FORMAT = 'INVALID_FORMAT',
}

/**
 * Content tree error
 */
export class ContentTreeError extends Error {
  constructor(
    message: string,
    public readonly code: ContentTreeErrorCode,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'ContentTreeError';
  }
}

export const ContentNodeSchema = z.object({
  id: z.number().int().positive(),
  /** 0 for top-level nodes */
  parentId: z.number().int().min(0).default(0),
  /** Structural kind, e.g. page, folder, recycler, separator */
  kind: z.string().min(1).default('page'),
  /** Document type in the search index */
  type: z.string().min(1).default('pages'),
  title: z.string().optional(),
});

export const ContentTreeFileSchema = z.object({
  nodes: z.array(ContentNodeSchema),
});

export type ContentNode = z.infer<typeof ContentNodeSchema>;

export class ContentTree {
  private byKey = new Map<string, ContentNode>();
  private children = new Map<number, ContentNode[]>();

  constructor(nodes: readonly ContentNode[]) {
    for (const node of nodes) {
      this.byKey.set(documentKey({ type: node.type, id: node.id }), node);
    }
    // pages before records so subpages are visited ahead of the records on a page
    const pages = nodes.filter((node) => node.type === 'pages');
    const records = nodes.filter((node) => node.type !== 'pages');
    for (const node of [...pages, ...records]) {
      const siblings = this.children.get(node.parentId);
      if (siblings === undefined) {
        this.children.set(node.parentId, [node]);
      } else {
        siblings.push(node);
      }
    }
  }

  /**
   * Load a tree from a JSON file
   */
  static load(path: string): ContentTree {
    let text: string;
    try {
      text = readFileSync(path, 'utf-8');
    } catch (error) {
      throw new ContentTreeError(
        `Failed to read content tree ${path}`,
        ContentTreeErrorCode.FILE_NOT_READABLE,
        error instanceof Error ? error : undefined
      );
    }
    return ContentTree.parse(text, path);
  }

  static parse(text: string, source: string = 'content tree'): ContentTree {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new ContentTreeError(
        `Invalid JSON in ${source}`,
        ContentTreeErrorCode.INVALID_FORMAT,
        error instanceof Error ? error : undefined
      );
    }
    const result = ContentTreeFileSchema.safeParse(data);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ContentTreeError(`Invalid ${source}: ${details}`, ContentTreeErrorCode.INVALID_FORMAT);
    }
    return new ContentTree(result.data.nodes);
  }

  get size(): number {
    return this.byKey.size;
  }

  getNode(ref: DocumentRef): ContentNode | undefined {
    return this.byKey.get(documentKey(ref));
  }

  getPage(id: number): ContentNode | undefined {
    return this.byKey.get(documentKey({ type: 'pages', id }));
  }

  childrenOf(id: number): readonly ContentNode[] {
    return this.children.get(id) ?? [];
  }

  /**
   * Page ids from the node's container up to the top, nearest first.
   * A page is its own first entry.
   */
  containerChain(ref: DocumentRef): number[] {
    const node = this.getNode(ref);
    if (node === undefined) return [];

    const chain: number[] = [];
    const seen = new Set<number>();
    let current: number | undefined = node.type === 'pages' ? node.id : node.parentId;
    while (current !== undefined && current > 0 && !seen.has(current)) {
      seen.add(current);
      chain.push(current);
      current = this.getPage(current)?.parentId;
    }
    return chain;
  }
}

/**
 * Documents of a site, breadth-first from its root (root included)
 *
 * Nodes of an excluded kind are neither yielded nor descended into.
 */
export function* enumerateDocuments(
  tree: ContentTree,
  rootContainerId: number,
  excludedKinds: readonly string[]
): Generator<DocumentRef> {
  const root = tree.getPage(rootContainerId);
  if (root === undefined) return;

  const excluded = new Set(excludedKinds);
  const visited = new Set<string>();
  const queue: ContentNode[] = [root];

  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    if (node === undefined || excluded.has(node.kind)) continue;

    const key = documentKey({ type: node.type, id: node.id });
    if (visited.has(key)) continue;
    visited.add(key);

    yield createDocumentRef(node.type, node.id);

    if (node.type === 'pages') {
      queue.push(...tree.childrenOf(node.id));
    }
  }
}

/**
 * Resolves partitions from the content tree and the configured site roots
 */
export class ContentTreePartitionResolver implements PartitionResolver {
  private roots: Set<number>;

  constructor(
    private tree: ContentTree,
    sites: readonly SiteConfig[]
  ) {
    this.roots = new Set(sites.map((site) => site.rootContainerId));
  }

  resolvePartition(ref: DocumentRef, languageId: number): Promise<PartitionKey> {
    const chain = this.tree.containerChain(ref);
    if (chain.length === 0) {
      return Promise.reject(
        new RetrievalError(
          `Document ${documentKey(ref)} is not in the content tree`,
          RetrievalErrorCode.ROUTING_FAILED
        )
      );
    }

    const rootContainerId = chain.find((id) => this.roots.has(id));
    if (rootContainerId === undefined) {
      return Promise.reject(
        new RetrievalError(
          `No configured site contains ${documentKey(ref)}`,
          RetrievalErrorCode.ROUTING_FAILED
        )
      );
    }

    return Promise.resolve({ rootContainerId, languageId });
  }
}
