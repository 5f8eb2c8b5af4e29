// Opaque line source the INI scanner reads from.
// PURITY: CORE (interface only; implementations live in core/ini and shell/io)

import type { Either } from "effect";

import type { SourceOpenFailed } from "../errors.js";

/**
 * Readable sequence of text lines.
 *
 * @invariant readLine returns lines without their terminator, then null forever
 */
export interface LineSource {
	readLine(): string | null;
	close(): void;
}

/**
 * Opens a named source. The caller owns (and must close) what it returns.
 */
export type SourceOpener = (
	path: string,
) => Either.Either<LineSource, SourceOpenFailed>;
