import fs from 'fs';
import path from 'path';

export const readPayload = (opts: { file?: string; json?: string }): unknown => {
  if (opts.json) return JSON.parse(opts.json);
  if (opts.file) return JSON.parse(fs.readFileSync(path.resolve(process.cwd(), opts.file), 'utf-8'));
  throw new Error('Provide --file <path> or --json <payload>');
};

export const printJSON = (data: unknown) => {
  console.log(JSON.stringify(data, null, 2));
};
