/**
 * Control lookup over the DevTools protocol
 *
 * `DOM.getDocument` with `pierce: true` returns closed shadow roots and
 * in-process frame documents, which CSS selectors cannot reach. A control
 * is tracked by its backendNodeId: the id stays bound to one element for
 * as long as that element exists.
 */

import type { CDPSession } from 'playwright';
import type { ControlPredicate } from './browser-session.js';
import { errorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';

export type CdpClient = Pick<CDPSession, 'send'>;

/** The parts of a CDP DOM.Node the lookup reads */
export interface DomNode {
  nodeType: number;
  nodeValue: string;
  backendNodeId: number;
  children?: DomNode[];
  shadowRoots?: DomNode[];
  contentDocument?: DomNode;
}

export interface Point {
  x: number;
  y: number;
}

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

export const REMOVAL_POLL_MS = 100;

/**
 * Concatenated direct text children, trimmed
 */
export function ownText(node: DomNode): string {
  return (node.children ?? [])
    .filter((child) => child.nodeType === TEXT_NODE)
    .map((child) => child.nodeValue)
    .join('')
    .trim();
}

/**
 * First element, in document order, whose own text satisfies predicate.
 * Shadow roots are visited before an element's light children.
 */
export function findControlNode(root: DomNode, predicate: ControlPredicate): number | null {
  const stack: DomNode[] = [root];
  let node = stack.pop();
  while (node) {
    if (node.nodeType === ELEMENT_NODE && predicate(ownText(node))) {
      return node.backendNodeId;
    }
    const next = [
      ...(node.shadowRoots ?? []),
      ...(node.contentDocument ? [node.contentDocument] : []),
      ...(node.children ?? []),
    ];
    for (let i = next.length - 1; i >= 0; i--) {
      stack.push(next[i]);
    }
    node = stack.pop();
  }
  return null;
}

export async function locateControl(client: CdpClient, predicate: ControlPredicate): Promise<number | null> {
  const { root } = await client.send('DOM.getDocument', { depth: -1, pierce: true });
  return findControlNode(root, predicate);
}

/**
 * Whether the node is still attached to its document. A node the target no
 * longer knows, or a target that has gone away with its frame, counts as
 * detached.
 */
export async function isNodeConnected(client: CdpClient, backendNodeId: number): Promise<boolean> {
  try {
    const { object } = await client.send('DOM.resolveNode', { backendNodeId });
    if (!object.objectId) {
      return false;
    }
    const { result } = await client.send('Runtime.callFunctionOn', {
      objectId: object.objectId,
      functionDeclaration: 'function () { return this.isConnected; }',
      returnByValue: true,
    });
    await client.send('Runtime.releaseObject', { objectId: object.objectId });
    return result.value === true;
  } catch (error) {
    logger.browser.debug('Control no longer resolvable', { backendNodeId, error: errorMessage(error) });
    return false;
  }
}

/**
 * Poll until the node is detached. Resolves false once timeoutMs has
 * passed with the node still attached.
 */
export async function waitForNodeRemoval(
  client: CdpClient,
  backendNodeId: number,
  timeoutMs: number,
  wait: (ms: number) => Promise<void>,
  pollMs: number = REMOVAL_POLL_MS
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    if (!(await isNodeConnected(client, backendNodeId))) {
      return true;
    }
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return false;
    }
    await wait(Math.min(pollMs, remaining));
  }
}

/**
 * Scroll the node into view and return the centre of its first content
 * quad, in the client's viewport coordinates.
 */
export async function nodeCenter(client: CdpClient, backendNodeId: number): Promise<Point> {
  await client.send('DOM.scrollIntoViewIfNeeded', { backendNodeId });
  const { quads } = await client.send('DOM.getContentQuads', { backendNodeId });
  const quad = quads[0];
  if (!quad || quad.length < 8) {
    throw new Error('Verification control has no rendered box');
  }
  return {
    x: (quad[0] + quad[2] + quad[4] + quad[6]) / 4,
    y: (quad[1] + quad[3] + quad[5] + quad[7]) / 4,
  };
}
