export type HeaderPair = [name: string, value: string];

export interface ObservedRequest {
  method: string;
  path: string;
  headers: HeaderPair[];
  // Only POST requests carry a body in the log
  body?: string;
}

/**
 * Pairs up `IncomingMessage.rawHeaders`, which is a flat
 * `[name, value, name, value, ...]` list in receipt order.
 */
export function headerPairs(rawHeaders: string[]): HeaderPair[] {
  const pairs: HeaderPair[] = [];
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    pairs.push([rawHeaders[i], rawHeaders[i + 1]]);
  }
  return pairs;
}

/**
 * Renders one request as a console block. The leading empty line separates
 * consecutive blocks; the caller adds the trailing newline.
 */
export function formatRequestLog(request: ObservedRequest): string {
  const lines = [
    '',
    `===== ${request.method} REQUEST ======`,
    `Path: ${request.path}`,
    'Headers:',
  ];

  for (const [name, value] of request.headers) {
    lines.push(`  ${name}: ${value}`);
  }

  if (request.body !== undefined) {
    lines.push('Body:', request.body);
  }

  return lines.join('\n');
}
