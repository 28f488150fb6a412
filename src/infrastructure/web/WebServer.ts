import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import type { ChatService } from '../../application/services/ChatService.js';
import { AppError, RequestBodyError, ValidationError } from '../../core/errors.js';
import {
  validateAddMessage,
  validateCreateConversation,
  validateSendMessage,
} from '../../core/validation.js';

export interface WebServerOptions {
  host: string;
  port: number;
  corsOrigins: string[];
}

export type ServerEvent =
  | { type: 'connected'; timestamp: string }
  | { type: 'conversation_updated'; conversationId: string; timestamp: string };

/**
 * HTTP status attached by body-parser (and other http-errors producers),
 * when it is a client error
 */
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  const status =
    'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  if (typeof status === 'number' && Number.isInteger(status) && status >= 400 && status < 500) {
    return status;
  }
  return null;
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();

  constructor(
    private chatService: ChatService,
    private options: WebServerOptions,
    private debugLog: (message: string) => void = () => {}
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    const origin = this.options.corsOrigins.includes('*') ? '*' : this.options.corsOrigins;
    this.app.use(cors({ origin }));
    this.app.use(express.json());
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.debugLog(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/', (_req: Request, res: Response) => {
      res.json({ message: 'Chat backend is running' });
    });

    this.app.get('/api/hello', (_req: Request, res: Response) => {
      res.json({ message: 'Hello from the backend API!' });
    });

    // API: Store diagnostics
    this.app.get('/api/health', (_req: Request, res: Response) => {
      const database = this.chatService.getDiagnostics();
      res.json({
        success: true,
        data: {
          backend: 'running',
          database,
          timestamp: new Date().toISOString(),
        },
      });
    });

    // API: Create a conversation
    this.app.post('/api/conversations', (req: Request, res: Response) => {
      try {
        const input = validateCreateConversation(req.body);
        if (!input.success) {
          throw new ValidationError(input.issues);
        }
        const conversation = this.chatService.createConversation(input.data);
        res.json({ success: true, data: conversation });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: List conversations, newest first
    this.app.get('/api/conversations', (_req: Request, res: Response) => {
      try {
        res.json({ success: true, data: this.chatService.listConversations() });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Messages of a conversation, oldest first
    this.app.get('/api/conversations/:id/messages', (req: Request, res: Response) => {
      try {
        res.json({ success: true, data: this.chatService.listMessages(req.params.id) });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Add a message without generating a reply
    this.app.post('/api/conversations/:id/messages', (req: Request, res: Response) => {
      try {
        const input = validateAddMessage(req.body);
        if (!input.success) {
          throw new ValidationError(input.issues);
        }
        const message = this.chatService.addMessage(
          req.params.id,
          input.data.role,
          input.data.content
        );
        this.notifyConversationUpdate(req.params.id);
        res.json({ success: true, data: message });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Send a user message and get the assistant's reply
    this.app.post('/api/conversations/:id/send', (req: Request, res: Response) => {
      try {
        const input = validateSendMessage(req.body);
        if (!input.success) {
          throw new ValidationError(input.issues);
        }
        const reply = this.chatService.sendMessage(req.params.id, input.data.content);
        this.notifyConversationUpdate(req.params.id);
        res.json({ success: true, data: reply });
      } catch (error) {
        this.sendError(res, error);
      }
    });
  }

  private setupErrorHandling(): void {
    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ success: false, error: 'Route not found', code: 'NOT_FOUND' });
    });

    // Body parser failures land here
    this.app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof SyntaxError) {
        this.sendError(
          res,
          new ValidationError([{ path: 'body', message: 'Malformed JSON body' }])
        );
        return;
      }
      const status = clientErrorStatus(error);
      if (status !== null) {
        const message = error instanceof Error ? error.message : 'Invalid request body';
        const type =
          typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string'
            ? error.type
            : undefined;
        this.sendError(res, new RequestBodyError(message, status, type));
        return;
      }
      this.sendError(res, error);
    });
  }

  private sendError(res: Response, error: unknown): void {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        console.error('[WebServer] Request failed:', error.toJSON());
      }
      res.status(error.statusCode).json({
        success: false,
        error: error.message,
        code: error.code,
        ...(error instanceof ValidationError ? { details: error.issues } : {}),
      });
      return;
    }

    console.error('[WebServer] Unhandled error:', error);
    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
      code: 'INTERNAL_ERROR',
    });
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      this.debugLog('[WebServer] New WebSocket client connected');
      this.clients.add(ws);

      ws.on('close', () => {
        this.debugLog('[WebServer] WebSocket client disconnected');
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        console.error('[WebServer] WebSocket error:', error);
        this.clients.delete(ws);
      });

      this.send(ws, { type: 'connected', timestamp: new Date().toISOString() });
    });
  }

  private send(client: WebSocket, event: ServerEvent): void {
    if (client.readyState === WebSocket.OPEN) {
      client.send(JSON.stringify(event));
    }
  }

  public broadcast(event: ServerEvent): void {
    this.clients.forEach((client) => this.send(client, event));
  }

  public notifyConversationUpdate(conversationId: string): void {
    this.broadcast({
      type: 'conversation_updated',
      conversationId,
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Port the server is bound to; differs from the configured one when that is 0
   */
  public getPort(): number {
    const address = this.httpServer?.address();
    return typeof address === 'object' && address !== null ? address.port : this.options.port;
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.options.port, this.options.host, () => {
        console.log(`[WebServer] API available at http://${this.options.host}:${this.getPort()}`);
        this.setupWebSocket();
        resolve();
      });

      server.on('error', (error) => {
        console.error('[WebServer] Server error:', error);
        reject(error);
      });

      this.httpServer = server;
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      // Close all WebSocket connections
      this.clients.forEach((client) => {
        client.terminate();
      });
      this.clients.clear();

      if (this.wss) {
        this.wss.close();
        this.wss = null;
      }

      const server = this.httpServer;
      if (!server) {
        resolve();
        return;
      }

      this.httpServer = null;
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        console.log('[WebServer] HTTP server closed');
        resolve();
      });
      server.closeAllConnections();
    });
  }

  public isRunning(): boolean {
    return this.httpServer !== null;
  }
}
