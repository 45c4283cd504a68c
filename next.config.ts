import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // the dashboard only reads DynamoDB; sidecar parsing stays in the scripts
  serverExternalPackages: ["@google-cloud/vision"],
};

export default nextConfig;
