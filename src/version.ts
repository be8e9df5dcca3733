// This module centralizes server identity values so protocol metadata and routes stay in sync.

export const MCP_SERVER_NAME = 'mcp-capability-server';
export const MCP_SERVER_VERSION = '0.1.0';
export const LATEST_PROTOCOL_VERSION = '2025-03-26';

// The latest version is always offered back during negotiation.
export const SUPPORTED_PROTOCOL_VERSIONS: readonly string[] = [LATEST_PROTOCOL_VERSION, '2024-11-05', '2024-10-07'];

// This helper reports whether a peer-requested protocol version can be negotiated.
export function isSupportedProtocolVersion(version: unknown): version is string {
  return typeof version === 'string' && SUPPORTED_PROTOCOL_VERSIONS.includes(version);
}
