const MODEL_RE = /model\/([a-zA-Z0-9,]+)/;
const BUILD_RE = /build\/([a-zA-Z0-9]+)/;

export type DeviceIdentification = {
  model: string | undefined;
  build: string | undefined;
};

export type CompleteIdentification = {
  model: string;
  build: string;
};

function firstCapture(re: RegExp, value: string): string | undefined {
  const match = re.exec(value);
  return match?.[1];
}

/**
 * Extracts the hardware model ("iPad2,1") and firmware build ("13G37") the
 * device reports in its identification header. Surrounding text is ignored.
 */
export function parseDeviceIdentification(headerValue: unknown): DeviceIdentification {
  const value = typeof headerValue === 'string' ? headerValue : '';
  return {
    model: firstCapture(MODEL_RE, value),
    build: firstCapture(BUILD_RE, value),
  };
}

export function isCompleteIdentification(id: DeviceIdentification): id is CompleteIdentification {
  return id.model !== undefined && id.build !== undefined;
}

export function containsTraversal(token: string): boolean {
  return token.includes('..');
}
