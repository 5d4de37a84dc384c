export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly w: number;
  readonly h: number;
}

export interface Viewport {
  readonly width: number;
  readonly height: number;
}

export type BlendMode = "alpha" | "additive" | "multiply" | "none";

export type Flip = "none" | "horizontal" | "vertical";

export interface Texture {
  readonly id: number;
  readonly width: number;
  readonly height: number;
}

export interface FontHandle {
  readonly family: string;
  readonly size: number;
  readonly path: string;
}

export interface BlitOptions {
  /** Degrees, clockwise, around the destination centre unless `pivot` is set. */
  readonly rotation?: number;
  readonly pivot?: Point;
  readonly flip?: Flip;
  /** 0..255, multiplied with the current blend. */
  readonly alpha?: number;
}

/** Vertex for `blitGeometry`; `u`/`v` are normalised texture coordinates. */
export interface GeometryVertex {
  readonly x: number;
  readonly y: number;
  readonly u: number;
  readonly v: number;
}

export interface Renderer {
  readonly width: number;
  readonly height: number;
  clear(color: Color): void;
  fillRect(rect: Rect, color: Color): void;
  drawLine(from: Point, to: Point, color: Color, thickness?: number): void;
  drawPoint(point: Point, color: Color): void;
  fillCircle(center: Point, radius: number, color: Color): void;
  strokeCircle(center: Point, radius: number, color: Color): void;
  blit(texture: Texture, src: Rect | null, dst: Rect, options?: BlitOptions): void;
  blitGeometry(
    texture: Texture,
    vertices: readonly GeometryVertex[],
    indices: readonly number[],
  ): void;
  setBlendMode(mode: BlendMode): void;
  createTexture(width: number, height: number, pixels: Uint8ClampedArray): Texture;
  /** Decodes PNG or JPEG bytes. */
  decodeImage(bytes: Uint8Array): Promise<Texture>;
  createRenderTarget(width: number, height: number): Texture;
  setRenderTarget(target: Texture | null): void;
  renderText(font: FontHandle, text: string, color: Color): Texture;
  measureText(font: FontHandle, text: string): { width: number; height: number };
  destroyTexture(texture: Texture): void;
  present(): void;
}

export type InputEvent =
  | { readonly type: "quit"; readonly reason: string }
  | { readonly type: "key"; readonly key: string }
  | { readonly type: "pointer-button"; readonly x: number; readonly y: number; readonly button: number }
  | { readonly type: "pointer-motion"; readonly x: number; readonly y: number };

export interface Clock {
  nowMs(): number;
  sleep(ms: number): Promise<void>;
}

export interface WindowRequest {
  readonly title: string;
  readonly fullscreen: boolean;
  readonly size?: Viewport;
  /** No presenter and no terminal input; termination signals still arrive. */
  readonly offscreen?: boolean;
}

export interface WindowContext {
  readonly title: string;
  readonly fullscreen: boolean;
  readonly viewport: Viewport;
  readonly renderer: Renderer;
}
