import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // File tracing does not follow the store's dynamic fs reads; keep the curriculum data next to the API routes.
  outputFileTracingIncludes: {
    "/*": ["./data/**/*"]
  }
};

export default nextConfig;
