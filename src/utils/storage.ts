import fs from "node:fs/promises";
import path from "node:path";

export async function readJson<T>(
	filePath: string,
	isValid: (value: unknown) => value is T,
	fallback: T,
): Promise<T> {
	let content: string;
	try {
		content = await fs.readFile(filePath, "utf8");
	} catch (err: unknown) {
		if (isMissingFile(err)) {
			return fallback;
		}
		throw err;
	}

	const parsed: unknown = JSON.parse(content);
	if (!isValid(parsed)) {
		throw new Error(`Unexpected content in ${filePath}`);
	}
	return parsed;
}

// Readers only ever see the previous file or the complete new one.
export async function writeFileAtomic(
	filePath: string,
	content: string,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	const tmpFile = `${filePath}.tmp`;
	await fs.writeFile(tmpFile, content, "utf8");
	await fs.rename(tmpFile, filePath);
}

export async function writeJson(
	filePath: string,
	data: unknown,
): Promise<void> {
	await writeFileAtomic(filePath, JSON.stringify(data, null, 2));
}

export async function appendLine(
	filePath: string,
	line: string,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.appendFile(filePath, `${line}\n`, "utf8");
}

function isMissingFile(err: unknown): boolean {
	return (
		typeof err === "object" &&
		err !== null &&
		"code" in err &&
		err.code === "ENOENT"
	);
}
