/** 目錄掃描時納入的影像格式 */
export const imageExtensions = [
  ".jpg",
  ".jpeg",
  ".png",
  ".heic",
  ".tif",
  ".tiff",
  ".bmp",
] as const;
