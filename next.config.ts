import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  output: "standalone",
  // The vendor SDKs are only ever called from route handlers
  serverExternalPackages: ["@anthropic-ai/sdk", "openai"],
};

export default nextConfig;
