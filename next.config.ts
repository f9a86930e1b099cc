import type { NextConfig } from 'next'

const nextConfig: NextConfig = {
  // pino resolves its transports at runtime
  serverExternalPackages: ['pino'],
}

export default nextConfig
