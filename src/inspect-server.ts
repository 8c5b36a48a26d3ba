import http from 'http';
import { Duplex } from 'stream';
import { TextDecoder } from 'util';
import { BodyDecodeError, RequestAbortedError } from './errors';
import { formatRequestLog, headerPairs } from './request-log';

export const GET_RESPONSE_BODY = 'GET request received';
export const POST_RESPONSE_BODY = 'POST request received';

const BAD_REQUEST_BODY = 'Bad Request';
const BAD_REQUEST_RESPONSE = [
  'HTTP/1.1 400 Bad Request',
  'Content-Type: text/plain',
  `Content-Length: ${Buffer.byteLength(BAD_REQUEST_BODY)}`,
  'Connection: close',
  '',
  BAD_REQUEST_BODY,
].join('\r\n');

export interface InspectServerOptions {
  // Receives one complete request block per call
  log?: (block: string) => void;
  warn?: (message: string) => void;
}

function sendText(res: http.ServerResponse, statusCode: number, body: string): void {
  res.writeHead(statusCode, {
    'Content-Type': 'text/plain',
    'Content-Length': Buffer.byteLength(body),
  });
  res.end(body);
}

function readBody(req: http.IncomingMessage, path: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', (error) => reject(req.complete ? error : new RequestAbortedError('POST', path)));
    req.on('close', () => {
      if (!req.complete) {
        reject(new RequestAbortedError('POST', path));
      }
    });
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function decodeBody(body: Buffer): string {
  const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  try {
    return decoder.decode(body);
  } catch (error) {
    throw new BodyDecodeError(errorMessage(error));
  }
}

/**
 * Builds the diagnostic listener. The returned server is not listening yet;
 * call `listen()` on it (or hand it to a test client).
 */
export function createInspectServer(options: InspectServerOptions = {}): http.Server {
  const log = options.log ?? ((block: string) => console.log(block));
  const warn = options.warn ?? ((message: string) => console.error(message));

  async function handlePost(req: http.IncomingMessage, res: http.ServerResponse, path: string): Promise<void> {
    // Only a declared Content-Length is read; anything else (e.g. a chunked
    // body) is drained and logged as empty.
    const declared = req.headers['content-length'] !== undefined;
    const raw = await readBody(req, path);
    const body = declared ? decodeBody(raw) : '';

    log(formatRequestLog({
      method: 'POST',
      path,
      headers: headerPairs(req.rawHeaders),
      body,
    }));
    sendText(res, 200, POST_RESPONSE_BODY);
  }

  function handleFailure(res: http.ServerResponse, method: string, path: string, error: unknown): void {
    if (error instanceof RequestAbortedError) {
      warn(error.message);
      return;
    }

    if (error instanceof BodyDecodeError) {
      warn(`Failed to decode body of ${method} ${path}: ${error.message}`);
      if (!res.headersSent) {
        sendText(res, 400, 'Request body is not valid UTF-8');
      }
      return;
    }

    warn(`Error handling ${method} ${path}: ${errorMessage(error)}`);
    if (!res.headersSent) {
      sendText(res, 500, 'Internal server error');
    }
  }

  const server = http.createServer((req, res) => {
    const method = req.method ?? '';
    const path = req.url ?? '';

    if (method === 'GET') {
      req.resume();
      log(formatRequestLog({
        method,
        path,
        headers: headerPairs(req.rawHeaders),
      }));
      sendText(res, 200, GET_RESPONSE_BODY);
      return;
    }

    if (method === 'POST') {
      handlePost(req, res, path).catch((error: unknown) => handleFailure(res, method, path, error));
      return;
    }

    const reason = `Unsupported method ('${method}')`;
    warn(`code 501, message ${reason}`);
    req.resume();
    sendText(res, 501, reason);
  });

  // The parser rejects bad framing (e.g. a non-numeric Content-Length)
  // before any request handler runs.
  server.on('clientError', (error: Error, socket: Duplex) => {
    const code = 'code' in error ? error.code : undefined;
    if (code === 'ECONNRESET' || !socket.writable) {
      socket.destroy();
      return;
    }

    warn(`Malformed request: ${error.message}`);
    socket.end(BAD_REQUEST_RESPONSE);
  });

  return server;
}
