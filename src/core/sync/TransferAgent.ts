/**
 * Device transfer collaborator
 *
 * Every operation either resolves or throws: ProbeError for listing and
 * hashing, TransferError for mutations. An empty listing is a normal result,
 * never a signal of failure.
 */

export interface DeviceInfo {
  /** Serial port used to connect, e.g. /dev/ttyUSB0 or COM3 */
  port: string;
  /** Full listing line as reported by the agent */
  description: string;
}

export interface TransferAgent {
  listDevices(): Promise<DeviceInfo[]>;

  /** Every regular file on the device, slash-separated without a leading slash */
  listFiles(device: string): Promise<string[]>;

  /** Device-side SHA-256 of a file; empty string when the output carries no digest */
  hashFile(device: string, remotePath: string): Promise<string>;

  removeFile(device: string, remotePath: string): Promise<void>;

  /** Creating a directory that already exists succeeds */
  makeDirectory(device: string, remotePath: string): Promise<void>;

  copyFile(device: string, localPath: string, remotePath: string): Promise<void>;

  softReset(device: string): Promise<void>;
}
