// CRC-32 (IEEE, reflected polynomial 0xEDB88320), used to fingerprint framebuffers in harness runs
const table = new Uint32Array(256).map((_, n) => {
  let c = n;
  for (let k = 0; k < 8; k++) c = (c & 1) ? 0xEDB88320 ^ (c >>> 1) : (c >>> 1);
  return c >>> 0;
});

export function crc32(bytes: Uint8Array): number {
  let crc = 0xFFFFFFFF;
  for (const b of bytes) crc = (crc >>> 8) ^ table[(crc ^ b) & 0xFF];
  return (~crc) >>> 0;
}
