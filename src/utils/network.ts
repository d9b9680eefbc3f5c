import os from 'os';

type InterfaceTable = ReturnType<typeof os.networkInterfaces>;

/**
 * First non-internal IPv4 address of the host, preferring wireless and
 * ethernet interfaces. Undefined when the host only has loopback.
 */
export function resolveLocalAddress(interfaces: InterfaceTable = os.networkInterfaces()): string | undefined {
  const names = Object.keys(interfaces).sort((a, b) => rank(a) - rank(b));

  for (const name of names) {
    const address = (interfaces[name] ?? []).find(entry => entry.family === 'IPv4' && !entry.internal);
    if (address) {
      return address.address;
    }
  }

  return undefined;
}

function rank(name: string): number {
  if (/^(wlan|wl)/i.test(name)) return 0;
  if (/^(eth|en)/i.test(name)) return 1;
  return 2;
}
