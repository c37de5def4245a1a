import type { ArchiveSource } from "./types.js";

interface ChunkNode {
	data: Uint8Array;
	consumed: number; // Bytes.
}

/** Sequential, fixed-size reads over an {@link ArchiveSource}. */
export interface BlockReader {
	/**
	 * Fills `into` from the source and resolves with the number of bytes copied.
	 * The count is only lower than `into.length` once the source is exhausted.
	 */
	read(into: Uint8Array): Promise<number>;
	/** Releases the underlying iterator. Safe to call more than once. */
	close(): Promise<void>;
}

export function createBlockReader(source: ArchiveSource): BlockReader {
	const iterator = source[Symbol.asyncIterator]();
	const chunkQueue: ChunkNode[] = [];
	let ended = false;
	let closed = false;

	// Pulls the next non-empty chunk from the source. Returns false at end of stream.
	async function fill(): Promise<boolean> {
		while (!ended) {
			const result = await iterator.next();
			if (result.done) {
				ended = true;
				break;
			}

			if (result.value.length > 0) {
				chunkQueue.push({ data: result.value, consumed: 0 });
				return true;
			}
		}

		return false;
	}

	return {
		async read(into: Uint8Array): Promise<number> {
			let offset = 0;

			// Consume chunks in FIFO order.
			while (offset < into.length) {
				if (chunkQueue.length === 0 && !(await fill())) break;

				const chunkNode = chunkQueue[0];
				const available = chunkNode.data.length - chunkNode.consumed;
				const toCopy = Math.min(into.length - offset, available);

				into.set(
					chunkNode.data.subarray(
						chunkNode.consumed,
						chunkNode.consumed + toCopy,
					),
					offset,
				);

				chunkNode.consumed += toCopy;
				offset += toCopy;

				// Remove the chunk if fully consumed.
				if (chunkNode.consumed >= chunkNode.data.length) {
					chunkQueue.shift();
				}
			}

			// Zero the tail so a short block never carries bytes from a previous read.
			if (offset < into.length) into.fill(0, offset);

			return offset;
		},

		async close(): Promise<void> {
			if (closed) return;
			closed = true;
			chunkQueue.length = 0;

			if (!ended) {
				ended = true;
				await iterator.return?.();
			}
		},
	};
}
