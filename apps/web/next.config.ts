import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  // Keep the logger's Node-only transports out of the server bundle
  serverExternalPackages: ['winston', 'winston-daily-rotate-file'],
};

export default nextConfig;
