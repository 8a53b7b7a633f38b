import fs from 'node:fs';
import type { Readable } from 'node:stream';

export type CliRuntime = {
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
  readText: (filePath: string) => Promise<string>;
  openStream: (filePath: string) => Readable;
};

export function createNodeRuntime(): CliRuntime {
  return {
    writeOut: (text: string) => {
      process.stdout.write(text);
    },
    writeErr: (text: string) => {
      process.stderr.write(text);
    },
    readText: (filePath: string) => fs.promises.readFile(filePath, 'utf-8'),
    openStream: (filePath: string) => fs.createReadStream(filePath)
  };
}
