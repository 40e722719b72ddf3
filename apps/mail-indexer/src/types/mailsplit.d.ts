// mailsplit ships without type declarations; only the parts used here
declare module "mailsplit" {
	import type { Transform, TransformOptions } from "node:stream";

	/** Header block of one MIME node, emitted before its body */
	export interface MimeNode {
		type: "node";
		/** Lowercase content type without parameters */
		contentType?: string | false;
		/** Multipart subtype for container nodes */
		multipart?: string | false;
		/** Lowercase Content-Transfer-Encoding */
		encoding?: string | false;
		charset?: string | false;
		/** Stream that undoes the node's transfer encoding */
		getDecoder(): Transform;
	}

	/** Multipart structure between bodies: preambles and boundary lines */
	export interface StructureChunk {
		type: "data";
		value: Buffer;
	}

	/** Body bytes for the most recent node */
	export interface BodyChunk {
		type: "body";
		value: Buffer;
	}

	export type SplitterChunk = MimeNode | StructureChunk | BodyChunk;

	export interface SplitterOptions extends TransformOptions {
		ignoreEmbedded?: boolean;
		maxHeadSize?: number;
	}

	export class Splitter extends Transform {
		constructor(options?: SplitterOptions);
		[Symbol.asyncIterator](): AsyncIterableIterator<SplitterChunk>;
	}

	const mailsplit: {
		Splitter: typeof Splitter;
	};
	export default mailsplit;
}
