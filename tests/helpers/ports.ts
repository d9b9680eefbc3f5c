import net from 'net';

// Asks the OS for an unused loopback port and releases it again.
export function findFreePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const probe = net.createServer();
    probe.once('error', reject);
    probe.listen(0, '127.0.0.1', () => {
      const address = probe.address();
      const port = typeof address === 'object' && address ? address.port : 0;
      probe.close(error => (error ? reject(error) : resolve(port)));
    });
  });
}

// Holds a port open until the returned close function is called.
export async function occupyPort(port: number): Promise<() => Promise<void>> {
  const blocker = net.createServer();
  await new Promise<void>((resolve, reject) => {
    blocker.once('error', reject);
    blocker.listen(port, '127.0.0.1', () => resolve());
  });
  return () => new Promise<void>((resolve, reject) => blocker.close(error => (error ? reject(error) : resolve())));
}
