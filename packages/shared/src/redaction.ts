const TOKEN_PATTERNS: RegExp[] = [
  /(rtmp:\/\/[^\s/]+\/[^\s/]+\/)([A-Za-z0-9_\-]+)()/gi,
  /(rtmps:\/\/[^\s/]+\/[^\s/]+\/)([A-Za-z0-9_\-]+)()/gi,
  /(rtsp:\/\/[^\s:/@]+:)([^\s@]+)(@)/gi,
  /("access_token"\s*:\s*")([^"]+)(")/gi,
  /("refresh_token"\s*:\s*")([^"]+)(")/gi,
  /("client_secret"\s*:\s*")([^"]+)(")/gi,
  /(Bearer\s+)([A-Za-z0-9._\-]+)()/gi
];

const mask = (token: string): string => {
  if (token.length <= 6) {
    return "***";
  }

  return `${token.slice(0, 3)}***${token.slice(-3)}`;
};

export const redactSensitive = (value: string): string => {
  return TOKEN_PATTERNS.reduce((output, pattern) => {
    return output.replace(pattern, (_match, prefix: string, token: string, suffix: string) => {
      return `${prefix}${mask(token)}${suffix}`;
    });
  }, value);
};

export const redactCommand = (argv: readonly string[]): string => {
  return argv.map((arg) => redactSensitive(arg)).join(" ");
};
