export const formatSize = (bytes: number): string => {
  const absBytes = Math.abs(bytes);
  const sign = bytes < 0 ? "-" : "";

  if (absBytes < 1024) return `${sign}${absBytes} B`;
  if (absBytes < 1024 * 1024) return `${sign}${(absBytes / 1024).toFixed(1)} KB`;
  if (absBytes < 1024 * 1024 * 1024) return `${sign}${(absBytes / 1024 / 1024).toFixed(1)} MB`;
  if (absBytes < 1024 * 1024 * 1024 * 1024)
    return `${sign}${(absBytes / 1024 / 1024 / 1024).toFixed(2)} GB`;
  return `${sign}${(absBytes / 1024 / 1024 / 1024 / 1024).toFixed(2)} TB`;
};

export const formatBytes = (bytes: number): string => bytes.toLocaleString("en-US");
