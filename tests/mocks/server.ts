import { setupServer } from 'msw/node';

/**
 * In-process stand-in for the news API, article pages and the completion
 * endpoint. Tests register handlers with `server.use(...)`; anything not
 * handled fails the test.
 */
export const server = setupServer();

export function startMswServer() {
  server.listen({ onUnhandledRequest: 'error' });
}

export function stopMswServer() {
  server.close();
}

export function resetMswHandlers() {
  server.resetHandlers();
}
