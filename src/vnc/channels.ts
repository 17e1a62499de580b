/**
 * Channel-order permutations between a negotiated 32-bit layout and RGBA.
 */

import type { Channel, ChannelOrder } from "./types.js";

export const CHANNEL_ORDERS: readonly ChannelOrder[] = ["bgra", "rgba", "argb", "abgr"];

const RGBA: readonly Channel[] = ["r", "g", "b", "a"];

/** Byte offset of `channel` within a pixel laid out as `order`. */
export function channelIndex(order: ChannelOrder, channel: Channel): number {
	return order.indexOf(channel);
}

/**
 * Rearrange `data` (pixels in `order`) into a new RGBA array.
 * "rgba" is copied as-is; the others are gathered channel by channel
 * ("abgr" works out to a full reversal of each pixel).
 */
export function toRgba(data: Uint8Array, order: ChannelOrder): Uint8Array {
	if (order === "rgba") return data.slice();
	return gather(
		data,
		RGBA.map((channel) => channelIndex(order, channel)),
	);
}

/** Inverse of toRgba: lay RGBA pixels out in `order`. */
export function fromRgba(rgba: Uint8Array, order: ChannelOrder): Uint8Array {
	if (order === "rgba") return rgba.slice();
	const sources = [0, 0, 0, 0];
	RGBA.forEach((channel, index) => {
		sources[channelIndex(order, channel)] = index;
	});
	return gather(rgba, sources);
}

function gather(data: Uint8Array, sources: readonly number[]): Uint8Array {
	const [s0, s1, s2, s3] = sources;
	const out = new Uint8Array(data.length);
	for (let i = 0; i < data.length; i += 4) {
		out[i] = data[i + s0];
		out[i + 1] = data[i + s1];
		out[i + 2] = data[i + s2];
		out[i + 3] = data[i + s3];
	}
	return out;
}
