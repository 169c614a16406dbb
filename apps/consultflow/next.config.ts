import type { NextConfig } from 'next'

const nextConfig: NextConfig = {
  transpilePackages: ['@consultflow/core', '@consultflow/adapters'],
  serverExternalPackages: ['openai'],
}

export default nextConfig
