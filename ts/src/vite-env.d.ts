/// <reference types="vite/client" />

// WGSL kernels are bundled as text through Vite's ?raw suffix.
declare module "*.wgsl?raw" {
  const source: string;
  export default source;
}
