// Spec model - shared across all packages
export * from './types'

// Container runtime interface - implemented by @berth/docker
export * from './runtime'

// Error taxonomy
export * from './errors'

// Canonical spec construction and comparison
export * from './container-spec'
export * from './diff'

// Image reference parsing
export * from './image-reference'

// Schemas for validation
export * from './schemas/manifest'
