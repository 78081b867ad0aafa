/*
 * Scripts evaluated inside the analysis context and the worker bootstrap that
 * hosts it. They are plain JavaScript because they run outside the compiled
 * program: the bootstrap in a worker thread, the rest inside a vm context
 * that holds no objects from the host realm.
 */

export const ENTRY_POINT = 'testHypothesis';

// Builds `df` from the JSON payload and a capturing `console`.
export const FRAME_PRELUDE = `
var __logs = [];
var console = (function () {
  function format(args) {
    return Array.prototype.map.call(args, function (arg) {
      if (typeof arg === 'string') return arg;
      try { return JSON.stringify(arg); } catch (error) { return String(arg); }
    }).join(' ');
  }
  function capture() { if (__logs.length < 200) __logs.push(format(arguments)); }
  return Object.freeze({ log: capture, info: capture, warn: capture, error: capture, debug: capture });
})();
var df = (function (payload) {
  var columns = payload.columns.map(function (column) {
    return {
      name: column.name,
      kind: column.kind,
      values: column.kind === 'temporal'
        ? column.values.map(function (value) { return value === null ? null : new Date(value); })
        : column.values
    };
  });
  var names = columns.map(function (column) { return column.name; });
  var dtypes = {};
  columns.forEach(function (column) { dtypes[column.name] = column.kind; });
  var rows = [];
  for (var index = 0; index < payload.rowCount; index += 1) {
    var row = {};
    for (var c = 0; c < columns.length; c += 1) row[columns[c].name] = columns[c].values[index];
    rows.push(row);
  }
  function frame(frameRows) {
    var self = {
      columns: names.slice(),
      dtypes: Object.assign({}, dtypes),
      rows: frameRows,
      length: frameRows.length,
      column: function (name) {
        if (names.indexOf(name) === -1) throw new Error('Column not found: ' + name);
        return frameRows.map(function (row) { return row[name]; });
      },
      unique: function (name) { return Array.from(new Set(self.column(name))); },
      filter: function (predicate) { return frame(frameRows.filter(predicate)); },
      groupBy: function (name) {
        var keys = self.column(name);
        var groups = new Map();
        frameRows.forEach(function (row, i) {
          if (!groups.has(keys[i])) groups.set(keys[i], []);
          groups.get(keys[i]).push(row);
        });
        var result = new Map();
        groups.forEach(function (groupRows, key) { result.set(key, frame(groupRows)); });
        return result;
      }
    };
    return Object.freeze(self);
  }
  return frame(rows);
})(JSON.parse(__payload));
`;

// Exposes simple-statistics as \`stats\` (and \`ss\`) whether it loaded as CommonJS or UMD.
export const MODULE_SHIM = 'var module = { exports: {} }; var exports = module.exports;';
export const STATS_BINDING = `
var stats = Object.keys(module.exports).length > 0 ? module.exports : globalThis.ss;
var ss = stats;
module = undefined;
exports = undefined;
`;

export const ENTRY_CALL = `
(function () {
  if (typeof ${ENTRY_POINT} !== 'function') return JSON.stringify({ status: 'missing' });
  var result = ${ENTRY_POINT}(df);
  if (!Array.isArray(result) || result.length !== 2) {
    return JSON.stringify({
      status: 'shape',
      received: Array.isArray(result) ? 'an array of length ' + result.length : typeof result
    });
  }
  var pValue = result[1];
  if (typeof pValue !== 'number') {
    return JSON.stringify({
      status: 'shape',
      received: 'a p-value of type ' + (pValue === null ? 'null' : Array.isArray(pValue) ? 'array' : typeof pValue)
    });
  }
  return JSON.stringify({ status: 'ok', success: Boolean(result[0]), pValue: Number.isFinite(pValue) ? pValue : null });
})()
`;

export const WORKER_BOOTSTRAP = `
const { parentPort, workerData } = require('node:worker_threads');
const vm = require('node:vm');
const fs = require('node:fs');

function describe(error) {
  if (error !== null && typeof error === 'object' && 'message' in error) {
    const name = typeof error.name === 'string' ? error.name : 'Error';
    return name + ': ' + String(error.message);
  }
  return String(error);
}

let context = null;
function readLogs() {
  if (context === null) return [];
  try {
    return JSON.parse(vm.runInContext('JSON.stringify(__logs)', context, { timeout: 1000 }));
  } catch (error) {
    return [];
  }
}

try {
  context = vm.createContext(Object.create(null), {
    name: 'hypoforge-analysis',
    codeGeneration: { strings: false, wasm: false }
  });
  const options = { timeout: workerData.timeoutMs };
  vm.runInContext('var __payload = ' + JSON.stringify(workerData.payload) + ';', context, options);
  vm.runInContext(workerData.moduleShim, context, options);
  vm.runInContext(fs.readFileSync(workerData.statsPath, 'utf8'), context, { filename: 'simple-statistics.js', timeout: workerData.timeoutMs });
  vm.runInContext(workerData.statsBinding, context, options);
  vm.runInContext(workerData.prelude, context, options);
  vm.runInContext(workerData.code, context, { filename: 'analysis.js', timeout: workerData.timeoutMs });
  const reply = JSON.parse(vm.runInContext(workerData.entryCall, context, options));
  reply.logs = readLogs();
  parentPort.postMessage(reply);
} catch (error) {
  parentPort.postMessage({ status: 'error', message: describe(error), logs: readLogs() });
}
`;
