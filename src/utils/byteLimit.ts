const MIB = 1024 * 1024;

export const formatByteLimit = (bytes: number) =>
  bytes % MIB === 0 ? `${bytes / MIB}MB` : `${bytes} bytes`;
