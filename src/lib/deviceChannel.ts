import { Server } from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import { z } from 'zod';
import { verifyToken } from './auth';
import { ProgressEngine, ProgressEngines } from './engine';
import { rankFor } from './ranks';

const clientMessageSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('LOCATION_UPDATE'),
        payload: z.object({
            latitude: z.number().min(-90).max(90),
            longitude: z.number().min(-180).max(180),
            accuracy: z.number().nonnegative(),
            timestamp: z.number().optional(),
        }),
    }),
    z.object({
        type: z.literal('LOCATION_ERROR'),
        payload: z.object({ reason: z.string() }),
    }),
    z.object({
        type: z.literal('AUTHORIZATION'),
        payload: z.object({ status: z.enum(['undetermined', 'authorized', 'denied']) }),
    }),
]);

type ClientMessage = z.infer<typeof clientMessageSchema>;

function send(ws: WebSocket, message: Record<string, unknown>) {
    if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(message));
}

function handleMessage(ws: WebSocket, engine: ProgressEngine, message: ClientMessage, receivedAt: number) {
    switch (message.type) {
        case 'LOCATION_UPDATE':
            engine.location.pushFix({
                latitude: message.payload.latitude,
                longitude: message.payload.longitude,
                accuracy: message.payload.accuracy,
                timestamp: message.payload.timestamp ?? receivedAt,
            });
            send(ws, { type: 'ACK', status: 'received' });
            break;
        case 'LOCATION_ERROR':
            engine.location.pushError(message.payload.reason);
            break;
        case 'AUTHORIZATION':
            engine.location.setAuthorization(message.payload.status);
            break;
    }
}

function handleConnection(ws: WebSocket, engines: ProgressEngines, userId: string, now: () => number = Date.now) {
    console.log(`Device connected: ${userId}`);
    const ready = engines.forUser(userId);
    let cleanup: Array<() => void> = [];
    let closed = false;

    void ready
        .then((engine) => {
            // The socket may have closed while progress was loading
            if (closed) return;
            cleanup = [
                engine.location.attach(() => send(ws, { type: 'LOCATION_REQUEST' })),
                engine.onProgressChanged((snapshot) => {
                    send(ws, {
                        type: 'PROGRESS_CHANGED',
                        payload: { totalPoints: snapshot.totalPoints, rank: rankFor(snapshot.totalPoints).id },
                    });
                }),
            ];
            send(ws, { type: 'READY' });
        })
        .catch((error) => {
            console.error('Failed to load progress for device', userId, error);
            ws.close(1011, 'progress unavailable');
        });

    ws.on('message', (data) => {
        const receivedAt = now();
        let message: ClientMessage;
        try {
            message = clientMessageSchema.parse(JSON.parse(data.toString()));
        } catch (error) {
            console.error('WS Message Error:', error);
            send(ws, { type: 'ERROR', error: 'invalid_message' });
            return;
        }

        void ready
            .then((engine) => handleMessage(ws, engine, message, receivedAt))
            .catch((error) => console.error('WS handler error:', error));
    });

    ws.on('close', () => {
        console.log(`Device disconnected: ${userId}`);
        closed = true;
        for (const fn of cleanup) fn();
        cleanup = [];
    });
}

/** Serves the device channel on `/ws?token=<jwt>` of an existing HTTP server. */
export function attachDeviceChannel(server: Server, engines: ProgressEngines, now: () => number = Date.now): WebSocketServer {
    const wss = new WebSocketServer({ noServer: true });

    server.on('upgrade', (request, socket, head) => {
        const url = new URL(request.url || '', 'http://localhost');

        if (url.pathname !== '/ws') {
            socket.destroy();
            return;
        }

        const token = url.searchParams.get('token');
        const payload = token ? verifyToken(token) : null;
        if (!payload) {
            socket.end('HTTP/1.1 401 Unauthorized\r\nConnection: close\r\n\r\n');
            return;
        }

        wss.handleUpgrade(request, socket, head, (ws) => handleConnection(ws, engines, payload.userId, now));
    });

    return wss;
}
