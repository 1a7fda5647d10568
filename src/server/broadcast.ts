import http from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import { eventBus, SIMULATION_EVENTS, SimulationEventMap, SimulationEventName } from '../events/event-bus';

/**
 * Relay simulation lifecycle events to WebSocket clients connected on /ws.
 * Returns a function that detaches the relay and closes the socket server.
 */
export function attachEventBroadcaster(server: http.Server): () => Promise<void> {
  const wss = new WebSocketServer({ server, path: '/ws' });
  const clients = new Set<WebSocket>();

  wss.on('connection', ws => {
    clients.add(ws);
    ws.on('close', () => clients.delete(ws));
  });

  const broadcast = (data: unknown) => {
    const msg = JSON.stringify(data);
    for (const ws of clients) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(msg);
      }
    }
  };

  const relays = SIMULATION_EVENTS.map(event => subscribe(event, broadcast));

  return () => {
    for (const detach of relays) detach();
    for (const ws of clients) ws.terminate();
    clients.clear();
    return new Promise<void>((resolve, reject) => {
      wss.close(err => (err ? reject(err) : resolve()));
    });
  };
}

function subscribe<K extends SimulationEventName>(
  event: K,
  broadcast: (data: { type: K; payload: SimulationEventMap[K] }) => void,
): () => void {
  const listener = (payload: SimulationEventMap[K]) => broadcast({ type: event, payload });
  eventBus.on(event, listener);
  return () => eventBus.off(event, listener);
}
