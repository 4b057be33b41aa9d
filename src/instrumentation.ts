// Runs once when the server boots; missing secrets stop it before any request is served.
export async function register() {
  if (process.env.NEXT_RUNTIME !== 'nodejs') return;
  const { loadConfig } = await import('./lib/config');
  loadConfig();
}
