import { parentPort } from 'node:worker_threads';

import { handleBandRequest, type BandRequest } from './bandProtocol.js';

if (!parentPort) {
  throw new Error('[bulb-cpu-worker] must be started as a worker thread');
}

const port = parentPort;

port.on('message', (request: BandRequest) => {
  const response = handleBandRequest(request);
  if (response.kind === 'band') {
    port.postMessage(response, [response.pixels]);
  } else {
    port.postMessage(response);
  }
});
