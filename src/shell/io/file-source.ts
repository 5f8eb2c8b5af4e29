// Descriptor-backed LineSource and the default SourceOpener.
// PURITY: SHELL
// INVARIANT: close() closes the descriptor at most once
// COMPLEXITY: O(n) over the file, read in fixed-size chunks

import { closeSync, fstatSync, openSync, readSync } from "node:fs";
import { StringDecoder } from "node:string_decoder";

import { Either } from "effect";

import { SourceOpenFailed } from "../../core/errors.js";
import type { LineSource, SourceOpener } from "../../core/types/index.js";

const CHUNK_SIZE = 64 * 1024;

/**
 * Reads a UTF-8 file line by line with synchronous descriptor reads.
 * Lines are returned without their "\n"; a missing final newline still
 * yields the last line.
 */
export class FileLineSource implements LineSource {
	private readonly decoder = new StringDecoder("utf8");
	private readonly chunk = Buffer.alloc(CHUNK_SIZE);
	private pending = "";
	private exhausted = false;
	private fd: number | null;

	constructor(fd: number) {
		this.fd = fd;
	}

	get isClosed(): boolean {
		return this.fd === null;
	}

	readLine(): string | null {
		for (;;) {
			const newline = this.pending.indexOf("\n");
			if (newline >= 0) {
				const line = this.pending.slice(0, newline);
				this.pending = this.pending.slice(newline + 1);
				return line;
			}
			if (this.exhausted || this.fd === null) return this.drain();
			this.fill(this.fd);
		}
	}

	close(): void {
		const fd = this.fd;
		if (fd === null) return;
		this.fd = null;
		this.pending = "";
		closeSync(fd);
	}

	private fill(fd: number): void {
		const read = readSync(fd, this.chunk, 0, CHUNK_SIZE, null);
		if (read === 0) {
			this.exhausted = true;
			this.pending += this.decoder.end();
			return;
		}
		this.pending += this.decoder.write(this.chunk.subarray(0, read));
	}

	private drain(): string | null {
		if (this.pending.length === 0) return null;
		const line = this.pending;
		this.pending = "";
		return line;
	}
}

const reasonOf = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

const openFailure =
	(path: string) =>
	(error: unknown): SourceOpenFailed =>
		new SourceOpenFailed({ path, reason: reasonOf(error) });

/** The descriptor back if it names a readable regular file. */
const checkReadable = (
	path: string,
	fd: number,
): Either.Either<number, SourceOpenFailed> =>
	Either.flatMap(
		Either.try({ try: () => fstatSync(fd), catch: openFailure(path) }),
		(stats): Either.Either<number, SourceOpenFailed> =>
			stats.isDirectory()
				? Either.left(new SourceOpenFailed({ path, reason: "is a directory" }))
				: Either.right(fd),
	);

/**
 * Opens `path` for reading; paths resolve against the working directory.
 *
 * @returns left(SourceOpenFailed) when the file cannot be opened, cannot be
 * inspected or is a directory
 * @invariant left(_) ⇒ no descriptor stays open
 */
export const openFileSource: SourceOpener = (path) =>
	Either.flatMap(
		Either.try({ try: () => openSync(path, "r"), catch: openFailure(path) }),
		(fd): Either.Either<LineSource, SourceOpenFailed> => {
			const checked = checkReadable(path, fd);
			if (Either.isLeft(checked)) closeSync(fd);
			return Either.map(checked, (open) => new FileLineSource(open));
		},
	);
