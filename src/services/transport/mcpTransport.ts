import { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  isJSONRPCError,
  isJSONRPCRequest,
  isJSONRPCResponse,
  JSONRPCMessage,
  RequestId,
} from '@modelcontextprotocol/sdk/types.js';

/**
 * Single-exchange transport for one HTTP invocation. `handle` delivers a
 * message to the connected server and resolves with the response to it, or
 * with `undefined` for notifications.
 */
export class InvocationTransport implements Transport {
  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: (message: JSONRPCMessage) => void;

  private readonly pending = new Map<RequestId, (message: JSONRPCMessage) => void>();
  private closed = false;

  async start(): Promise<void> {
    this.closed = false;
  }

  async send(message: JSONRPCMessage): Promise<void> {
    if (!isJSONRPCResponse(message) && !isJSONRPCError(message)) {
      // Server-initiated requests and notifications have no channel back
      return;
    }
    const resolve = this.pending.get(message.id);
    if (resolve) {
      this.pending.delete(message.id);
      resolve(message);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.pending.clear();
    this.onclose?.();
  }

  handle(message: JSONRPCMessage): Promise<JSONRPCMessage | undefined> {
    if (this.closed || !this.onmessage) {
      return Promise.reject(new Error('Transport is not connected'));
    }

    if (!isJSONRPCRequest(message)) {
      this.onmessage(message);
      return Promise.resolve(undefined);
    }

    const response = new Promise<JSONRPCMessage>(resolve => {
      this.pending.set(message.id, resolve);
    });
    this.onmessage(message);
    return response;
  }
}
