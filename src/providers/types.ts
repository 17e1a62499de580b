// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Provider interface: abstraction over whatever connects to VNC servers.
 * A provider owns transport, version handshake and authentication; this
 * package only ever sees the stream that comes out the other end.
 */

import type { Duplex } from "node:stream";

export interface Target {
	/** Provider-specific target identifier */
	readonly id: string;
	/** Human-readable name */
	readonly name: string;
	/** Free-form location or address, for display */
	readonly address?: string;
}

export interface Provider {
	/** Provider name */
	readonly name: string;

	/** List all targets reachable with the configured credentials. */
	listTargets(): Promise<Target[]>;

	/**
	 * Connect to a target and complete the RFB handshake up to and including
	 * ClientInit. The next bytes the stream yields must be ServerInit.
	 */
	openStream(targetId: string): Promise<Duplex>;
}
