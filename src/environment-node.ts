import {environment, defaultEnvironment} from './environment.js';
import fs from 'node:fs';

function toArrayBuffer(buffer: Buffer) {
  return buffer.buffer.slice(buffer.byteOffset, buffer.byteOffset + buffer.byteLength);
}

if (environment.resolveUrl === defaultEnvironment.resolveUrl) {
  environment.resolveUrl = async function (url) {
    if (url.protocol === 'file:') {
      return toArrayBuffer(await fs.promises.readFile(url));
    } else {
      return fetch(url).then(res => {
        if (!res.ok) throw new Error(res.statusText);
        return res.arrayBuffer();
      });
    }
  };
}

if (environment.resolveUrlSync === defaultEnvironment.resolveUrlSync) {
  environment.resolveUrlSync = function (url) {
    if (url.protocol === 'file:') {
      return toArrayBuffer(fs.readFileSync(url));
    } else {
      throw new Error(`Cannot load synchronously: ${url}`);
    }
  };
}
