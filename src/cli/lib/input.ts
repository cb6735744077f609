import { readFile } from 'node:fs/promises';

export interface InputSources {
  entries?: readonly string[];
  file?: string;
}

interface StdinLike extends AsyncIterable<string | Buffer> {
  isTTY?: boolean;
}

export async function readStream(stream: AsyncIterable<string | Buffer>): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
  }
  return chunks.join('');
}

/**
 * Collects raw parcel text from positional arguments and `--file`, falling
 * back to stdin when neither is given and stdin is piped.
 */
export async function collectInput(sources: InputSources, stdin: StdinLike = process.stdin): Promise<string> {
  const parts: string[] = [...(sources.entries ?? [])];

  if (sources.file) {
    parts.push(await readFile(sources.file, 'utf8'));
  }

  if (parts.length === 0 && !stdin.isTTY) {
    parts.push(await readStream(stdin));
  }

  const text = parts.join('\n');
  if (!text.trim()) {
    throw new Error('No parcel identifiers given. Pass them as arguments, with --file, or on stdin');
  }
  return text;
}
