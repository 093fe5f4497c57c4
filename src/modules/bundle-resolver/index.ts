export { resolveBundlePath, isAddressable } from './bundle-path-resolver.js'
export type { BundleResolution, BundlePathSource, BundleResolveOptions } from './bundle-path-resolver.js'
