import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  serverExternalPackages: ["pg", "csv-parse", "csv-stringify"],
};

export default nextConfig;
