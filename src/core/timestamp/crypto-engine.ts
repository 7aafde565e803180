import * as pkijs from 'pkijs';

const ENGINE_NAME = 'node-webcrypto';

let installed = false;

/**
 * Point pkijs at the WebCrypto implementation of the running Node.js.
 * pkijs only finds `self.crypto` by itself, which Node does not define.
 */
export function ensureCryptoEngine(): void {
  if (installed) return;
  pkijs.setEngine(
    ENGINE_NAME,
    new pkijs.CryptoEngine({ name: ENGINE_NAME, crypto: globalThis.crypto }),
  );
  installed = true;
}

/**
 * Copy bytes into a standalone ArrayBuffer, the input type pkijs and asn1js expect
 */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}
