import fs from "fs";

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    process.stdin.setEncoding("utf8");
    process.stdin.on("data", (chunk) => {
      data += chunk;
    });
    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", (error) => reject(error));
  });
}

/**
 * Reads JSON from the given file, else from piped stdin, else from the
 * fallback file.
 */
export async function readJsonInput(
  inputPath: string | undefined,
  fallbackPath: string
): Promise<unknown> {
  let raw: string;
  if (inputPath) {
    raw = fs.readFileSync(inputPath, "utf8");
  } else if (!process.stdin.isTTY) {
    raw = await readStdin();
  } else if (fs.existsSync(fallbackPath)) {
    raw = fs.readFileSync(fallbackPath, "utf8");
  } else {
    throw new Error(
      `No input: pass a track file, pipe JSON via stdin, or create ${fallbackPath} first.`
    );
  }
  return JSON.parse(raw);
}
