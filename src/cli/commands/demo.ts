import { fileURLToPath } from 'node:url';
import type { Command } from '../types.js';
import { readMatrixFile } from '../matrix-file.js';
import { formatResults, resolveCliConfig, solveMatrix } from './solve.js';

/** Bundled four-location example graph. */
export const DEMO_GRAPH_PATH = fileURLToPath(new URL('../../../data/demo-graph.json', import.meta.url));

export const demoCommand: Command = {
  name: 'demo',
  description: 'Run both algorithms on the bundled example graph',
  usage: 'tourkit demo',
  handler: async (_args) => {
    const config = resolveCliConfig({});
    const matrix = readMatrixFile(DEMO_GRAPH_PATH);

    if (matrix.description) {
      console.log(matrix.description);
      console.log('');
    }
    console.log(formatResults(solveMatrix(matrix, ['approx', 'exact'], config)));
  },
};
