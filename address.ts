import { networkInterfaces } from "node:os";

export const LOOPBACK_ADDRESS = "127.0.0.1";

type InterfaceMap = ReturnType<typeof networkInterfaces>;

/** First external IPv4 address, or loopback when the host has none. */
export function getLocalAddress(
	interfaces: InterfaceMap = networkInterfaces(),
): string {
	for (const nets of Object.values(interfaces)) {
		if (!nets) continue;
		for (const net of nets) {
			if (net.family === "IPv4" && !net.internal) return net.address;
		}
	}
	return LOOPBACK_ADDRESS;
}
