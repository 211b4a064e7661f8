import path from "path";

export function assetsDir(): string {
  return path.resolve(__dirname, "..", "..", "assets");
}

export function assetPath(...segments: string[]): string {
  return path.join(assetsDir(), ...segments);
}
