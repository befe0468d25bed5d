import { PNG } from 'pngjs'

export type RGB = [number, number, number]

export const LIT: RGB = [200, 200, 200]
export const UNLIT: RGB = [20, 20, 20]

// Scale a 1-bit framebuffer into an RGBA PNG image
export const framebufferToPng = (fb: Uint8Array, w: number, h: number, scale = 12): PNG => {
  const W = w * scale, H = h * scale
  const png = new PNG({ width: W, height: H })
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const [r, g, b] = fb[y * w + x] ? LIT : UNLIT
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W
        for (let dx = 0; dx < scale; dx++) {
          const o = ((oy + (x * scale + dx)) << 2)
          png.data[o + 0] = r
          png.data[o + 1] = g
          png.data[o + 2] = b
          png.data[o + 3] = 255
        }
      }
    }
  }
  return png
}

export const encodePng = (fb: Uint8Array, w: number, h: number, scale = 12): Buffer =>
  PNG.sync.write(framebufferToPng(fb, w, h, scale))
