import { writeFile } from 'node:fs/promises';
import { exampleDescriptor } from '../core/examples.js';
import { icons } from '../utils/output.js';

export interface ExampleOptions {
  output?: string;
}

/** Print an example descriptor, or write it to a file. */
export async function example(options: ExampleOptions = {}): Promise<string> {
  const text = `${JSON.stringify(exampleDescriptor(), null, 2)}\n`;
  if (options.output) {
    await writeFile(options.output, text, 'utf-8');
    console.log(`${icons.success} Wrote example descriptor to ${options.output}`);
  } else {
    process.stdout.write(text);
  }
  return text;
}
