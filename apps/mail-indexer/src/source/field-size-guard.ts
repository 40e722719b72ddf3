import { Transform, type TransformCallback } from "node:stream";
import { StringDecoder } from "node:string_decoder";

/**
 * Where the scanner is within the current CSV field. `quote` means a quote
 * was just seen inside a quoted field: the next character decides between an
 * escaped quote and the end of the quoted section.
 */
type FieldState = "start" | "unquoted" | "quoted" | "quote" | "closed";

/**
 * Bounds the CSV text handed to the parser.
 *
 * Data fields keep at most `maxFieldSize + 1` content characters (quote
 * characters always pass, so the CSV stays well formed). Each field that was
 * longer than `maxFieldSize` leaves its real length in a queue, in the order
 * fields end, for the reader to pick up with `takeOversized()`. The header
 * record passes unchanged.
 */
export class FieldSizeGuard extends Transform {
	private readonly decoder = new StringDecoder("utf8");
	private readonly oversized: number[] = [];
	private state: FieldState = "start";
	private fieldLength = 0;
	private recordHasContent = false;
	private headerDone = false;

	constructor(private readonly maxFieldSize: number) {
		super({ decodeStrings: false });
	}

	/** Real length of the next field that was cut short */
	takeOversized(): number | undefined {
		return this.oversized.shift();
	}

	override _transform(
		chunk: Buffer | string,
		_encoding: BufferEncoding,
		callback: TransformCallback,
	): void {
		const text = typeof chunk === "string" ? chunk : this.decoder.write(chunk);
		const kept = this.scan(text);
		if (kept.length > 0) this.push(kept);
		callback();
	}

	override _flush(callback: TransformCallback): void {
		const kept = this.scan(this.decoder.end());
		if (kept.length > 0) this.push(kept);
		if (this.state !== "start" || this.recordHasContent) {
			this.endField();
			this.endRecord();
		}
		callback();
	}

	private scan(text: string): string {
		const pieces: string[] = [];
		let runStart = 0;

		for (let i = 0; i < text.length; i++) {
			if (this.step(text.charAt(i))) continue;
			// dropped character: close the current run of kept text
			pieces.push(text.slice(runStart, i));
			runStart = i + 1;
		}
		pieces.push(text.slice(runStart));
		return pieces.join("");
	}

	/** Advance over one character; false when it must be dropped */
	private step(char: string): boolean {
		if (char !== "\r" && char !== "\n") this.recordHasContent = true;

		switch (this.state) {
			case "quoted":
				if (char === '"') {
					this.state = "quote";
					return true;
				}
				return this.content();
			case "quote":
				if (char === '"') {
					this.state = "quoted";
					this.fieldLength++;
					return true;
				}
				this.state = "closed";
				return this.delimiterOrContent(char);
			case "start":
				if (char === '"') {
					this.state = "quoted";
					return true;
				}
				return this.delimiterOrContent(char);
			case "unquoted":
			case "closed":
				return this.delimiterOrContent(char);
		}
	}

	private delimiterOrContent(char: string): boolean {
		if (char === ",") {
			this.endField();
			return true;
		}
		if (char === "\n") {
			this.endField();
			this.endRecord();
			return true;
		}
		if (char === "\r") {
			return true;
		}
		if (this.state === "start") this.state = "unquoted";
		return this.content();
	}

	private content(): boolean {
		this.fieldLength++;
		return !this.headerDone || this.fieldLength <= this.maxFieldSize + 1;
	}

	private endField(): void {
		if (this.headerDone && this.fieldLength > this.maxFieldSize) {
			this.oversized.push(this.fieldLength);
		}
		this.fieldLength = 0;
		this.state = "start";
	}

	private endRecord(): void {
		if (this.recordHasContent) this.headerDone = true;
		this.recordHasContent = false;
	}
}
