// ============================================================================
// Document tree (produced by the markup adapter, consumed read-only)
// ============================================================================

/** Tag name given to text leaves. */
export const TEXT_NODE_TAG = 'text';

/** Attribute key under which a text leaf exposes its literal content. */
export const TEXT_CONTENT_ATTRIBUTE = 'content';

export type DocumentNode = {
  /** Lowercase tag name, or `'text'` for a text leaf. */
  readonly tag: string;
  /** Attributes in source order. */
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly DocumentNode[];
};

/**
 * One node of a document-order (pre-order) traversal of the whole tree.
 * Element and text nodes both appear.
 */
export type FlatToken = {
  readonly node: DocumentNode;
  readonly tag: string;
  /** 0 for the root. */
  readonly depth: number;
  /** Position in the flattened sequence. */
  readonly index: number;
};

export const isTextNode = (node: DocumentNode): boolean => node.tag === TEXT_NODE_TAG;

/**
 * Literal text carried by the node itself (never by its descendants).
 * Returns an empty string for element nodes.
 */
export const getTextPayload = (node: DocumentNode): string => {
  if (!isTextNode(node)) return '';
  return node.attributes[TEXT_CONTENT_ATTRIBUTE] ?? '';
};
