import { JSDOM } from 'jsdom';
import {
  PipelineError,
  TEXT_CONTENT_ATTRIBUTE,
  TEXT_NODE_TAG,
  toPipelineError,
  type DocumentNode,
} from '@linewright/contracts';

/** Elements whose content is never laid out. */
export const DEFAULT_IGNORED_TAGS: readonly string[] = ['script', 'style', 'template'];

export type ParseOptions = {
  /** Elements dropped together with their subtree. */
  ignoredTags?: readonly string[];
  /** Keep text leaves that contain only whitespace. */
  keepWhitespaceText?: boolean;
};

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

const isElement = (node: Node): node is Element => node.nodeType === ELEMENT_NODE;
const isText = (node: Node): node is Text => node.nodeType === TEXT_NODE;

/**
 * Parse HTML into an immutable document tree rooted at `<html>`.
 *
 * Element nodes keep their lowercase tag name and attributes in source order.
 * Text becomes a `text` leaf with its content under the `content` attribute.
 * Comments and processing instructions are dropped.
 *
 * @throws {PipelineError} PARSE_ERROR when the parser fails or yields no root element
 */
export function parseDocument(markup: string, options: ParseOptions = {}): DocumentNode {
  if (typeof markup !== 'string') {
    throw new PipelineError('PARSE_ERROR', 'Markup must be a string', { received: typeof markup });
  }

  let dom: JSDOM;
  try {
    dom = new JSDOM(markup);
  } catch (error) {
    throw toPipelineError(error, 'PARSE_ERROR');
  }

  const root = dom.window.document.documentElement;
  if (!root) {
    throw new PipelineError('PARSE_ERROR', 'Document has no root element');
  }

  const ignored = new Set((options.ignoredTags ?? DEFAULT_IGNORED_TAGS).map((tag) => tag.toLowerCase()));
  const keepWhitespace = options.keepWhitespaceText ?? false;

  const convert = (element: Element): DocumentNode => {
    const attributes: Record<string, string> = {};
    for (const attr of Array.from(element.attributes)) {
      attributes[attr.name] = attr.value;
    }

    const children: DocumentNode[] = [];
    for (const child of Array.from(element.childNodes)) {
      if (isElement(child)) {
        if (ignored.has(child.localName)) continue;
        children.push(convert(child));
      } else if (isText(child)) {
        const content = child.data;
        if (!keepWhitespace && content.trim().length === 0) continue;
        children.push({
          tag: TEXT_NODE_TAG,
          attributes: { [TEXT_CONTENT_ATTRIBUTE]: content },
          children: [],
        });
      }
    }

    return { tag: element.localName, attributes, children };
  };

  try {
    return convert(root);
  } finally {
    dom.window.close();
  }
}
