import { startFunction, stopFunction } from '../../src/connectors/http.js';
import { text } from '../../src/codec/shapes.js';
import { hello } from './hello.js';

const server = startFunction(hello, { input: text, output: text });

process.on('SIGTERM', () => {
  stopFunction(server).then(
    () => process.exit(0),
    (err: unknown) => {
      console.error(`[FDK] Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  );
});
