/** File name of the transfer utility inside IDEVSPATH. */
export const EXECUTABLE_NAME = "idevsutil";

/** Working directory idevsutil leaves behind in the current directory. */
export const UTILITY_TEMP_DIR = "evs_temp";

export const UTILITY_DOWNLOAD_URLS = [
  "https://www.idrivedownloads.com/downloads/linux/download-options/IDrive_linux_64bit.zip",
  "https://www.idrivedownloads.com/downloads/linux/download-options/IDrive_linux_32bit.zip",
] as const;
