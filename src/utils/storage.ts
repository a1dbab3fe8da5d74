import fs from "node:fs/promises";
import path from "node:path";

export class StorageParseError extends Error {
	constructor(
		readonly filePath: string,
		cause: unknown,
	) {
		super(`Could not parse JSON in ${filePath}: ${String(cause)}`);
		this.name = "StorageParseError";
	}
}

export async function readJson(
	filePath: string,
	fallback: unknown,
): Promise<unknown> {
	let content: string;
	try {
		content = await fs.readFile(filePath, "utf8");
	} catch (err: unknown) {
		if (isErrnoException(err) && err.code === "ENOENT") {
			return fallback;
		}
		throw err;
	}

	try {
		return JSON.parse(content);
	} catch (err) {
		throw new StorageParseError(filePath, err);
	}
}

// Rewrites through a temp file and a rename.
export async function writeJson(
	filePath: string,
	data: unknown,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	const tmpPath = `${filePath}.${process.pid}.tmp`;
	await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), "utf8");
	await fs.rename(tmpPath, filePath);
}

export async function appendLine(
	filePath: string,
	line: string,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.appendFile(filePath, `${line}\n`, "utf8");
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}
