/**
 * Source of the sandbox worker
 *
 * Runs with `eval: true`, so it is plain CommonJS. The candidate is evaluated in
 * a fresh vm context that has no host globals; the only thing crossing into
 * the context is a JSON string, and the only thing crossing out is another.
 *
 * The prelude runs before the candidate. It captures the intrinsics it needs,
 * builds the metered grid and pins the entry point as a non-configurable
 * global, so nothing the candidate patches later reaches the meter.
 */

const PRELUDE_SOURCE = String.raw`
(() => {
  const define = Object.defineProperty;
  const parse = JSON.parse;
  const stringify = JSON.stringify;
  const reflectGet = Reflect.get;
  const reflectDescriptor = Reflect.getOwnPropertyDescriptor;
  const MeteredRow = Proxy;
  const StepError = RangeError;
  const toText = String;

  globalThis.console = { log() {}, info() {}, warn() {}, error() {}, debug() {} };

  const input = parse(globalThis.__sandboxInput);
  delete globalThis.__sandboxInput;

  let steps = 0;
  let exceeded = false;
  const meter = (key) => {
    if (typeof key !== 'string' || key === '') return;
    const index = +key;
    if (!(index >= 0) || index % 1 !== 0 || '' + index !== key) return;
    steps++;
    if (steps > input.maxSteps) {
      exceeded = true;
      throw new StepError('step budget exhausted');
    }
  };

  const handler = {
    __proto__: null,
    get(target, key, receiver) {
      meter(key);
      return reflectGet(target, key, receiver);
    },
    getOwnPropertyDescriptor(target, key) {
      meter(key);
      return reflectDescriptor(target, key);
    },
  };

  const grid = input.grid;
  const height = grid.length;
  const width = height > 0 ? grid[0].length : 0;
  const rows = [];
  for (let i = 0; i < height; i++) {
    rows[i] = new MeteredRow(grid[i], handler);
  }
  const start = input.start;
  const end = input.end;

  const describe = (error) => {
    try {
      return error && typeof error.message === 'string' ? error.message : toText(error);
    } catch {
      return 'Candidate threw an unreadable error';
    }
  };

  const run = () => {
    if (typeof CustomPathfindingAlgorithm !== 'function') {
      return stringify({ __proto__: null, status: 'error', message: 'CustomPathfindingAlgorithm is not defined' });
    }

    let output = null;
    let failure = null;
    try {
      const algorithm = new CustomPathfindingAlgorithm(width, height);
      const path = algorithm.findPath(rows, [start[0], start[1]], [end[0], end[1]]);
      const visited = algorithm.getVisitedOrder();
      output = stringify({ __proto__: null, status: 'ok', path, visited, steps });
    } catch (error) {
      failure = describe(error);
    }

    if (exceeded) {
      return stringify({ __proto__: null, status: 'step-limit', steps });
    }
    if (failure !== null) {
      return stringify({ __proto__: null, status: 'error', message: failure });
    }
    return output;
  };

  define(globalThis, '__sandboxRun', { value: run, writable: false, configurable: false, enumerable: false });
})();
`;

export const SANDBOX_WORKER_SOURCE = String.raw`
const { parentPort, workerData } = require('node:worker_threads');
const vm = require('node:vm');

const { source, input, timeoutMs } = workerData;
const PRELUDE = ${JSON.stringify(PRELUDE_SOURCE)};

function describe(error) {
  if (error && typeof error === 'object' && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

try {
  const context = vm.createContext(Object.create(null), {
    codeGeneration: { strings: false, wasm: false },
  });
  context.__sandboxInput = input;

  vm.runInContext(PRELUDE, context, { timeout: timeoutMs, filename: 'prelude.js' });
  vm.runInContext(source, context, { timeout: timeoutMs, filename: 'candidate.js' });
  const output = vm.runInContext('__sandboxRun()', context, { timeout: timeoutMs, filename: 'harness.js' });
  parentPort.postMessage(typeof output === 'string' ? JSON.parse(output) : { status: 'error', message: 'Harness produced no output' });
} catch (error) {
  if (error && error.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT') {
    parentPort.postMessage({ status: 'timeout' });
  } else {
    parentPort.postMessage({ status: 'error', message: describe(error) });
  }
}
`;
