/**
 * Gateway metrics tracking
 */

export class Metrics {
  private connectionCount: number = 0;
  private totalBytesSent: number = 0;
  private totalBytesReceived: number = 0;
  private framesFromClients: number = 0;
  private framesForwarded: number = 0;
  private busSendFailures: number = 0;
  private busFramesReceived: number = 0;
  private fanoutDeliveries: number = 0;
  private clientWriteFailures: number = 0;
  private truncatedFrames: number = 0;
  private decodeErrors: number = 0;
  private droppedBusFrames: number = 0;
  private startTime: number = Date.now();

  connectionOpened(): void {
    this.connectionCount++;
  }

  connectionClosed(): void {
    this.connectionCount = Math.max(0, this.connectionCount - 1);
  }

  bytesSent(bytes: number): void {
    this.totalBytesSent += bytes;
  }

  bytesReceived(bytes: number): void {
    this.totalBytesReceived += bytes;
  }

  /**
   * Track a frame decoded from a client and whether the bus took it
   */
  clientFrame(forwarded: boolean): void {
    this.framesFromClients++;
    if (forwarded) {
      this.framesForwarded++;
    } else {
      this.busSendFailures++;
    }
  }

  /**
   * Track one bus frame and the number of clients it reached
   */
  busFrame(deliveries: number): void {
    this.busFramesReceived++;
    this.fanoutDeliveries += deliveries;
  }

  clientWriteFailed(): void {
    this.clientWriteFailures++;
  }

  frameTruncated(): void {
    this.truncatedFrames++;
  }

  decodeError(): void {
    this.decodeErrors++;
  }

  setDroppedBusFrames(total: number): void {
    this.droppedBusFrames = total;
  }

  /**
   * Get current metrics snapshot
   */
  getSnapshot() {
    const uptimeMs = Date.now() - this.startTime;
    const uptimeSec = Math.floor(uptimeMs / 1000);

    return {
      uptime: `${uptimeSec}s`,
      connections: this.connectionCount,
      totalBytesSent: this.formatBytes(this.totalBytesSent),
      totalBytesReceived: this.formatBytes(this.totalBytesReceived),
      framesFromClients: this.framesFromClients,
      framesForwarded: this.framesForwarded,
      busSendFailures: this.busSendFailures,
      busFramesReceived: this.busFramesReceived,
      fanoutDeliveries: this.fanoutDeliveries,
      clientWriteFailures: this.clientWriteFailures,
      truncatedFrames: this.truncatedFrames,
      decodeErrors: this.decodeErrors,
      droppedBusFrames: this.droppedBusFrames,
    };
  }

  /**
   * Format bytes to human-readable
   */
  private formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes}B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)}KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)}MB`;
  }

  /**
   * Print metrics to console
   */
  print(): void {
    const snapshot = this.getSnapshot();
    console.log("\nGateway Metrics:");
    console.log(`  Uptime:                ${snapshot.uptime}`);
    console.log(`  Active Connections:    ${snapshot.connections}`);
    console.log(`  Bytes Sent:            ${snapshot.totalBytesSent}`);
    console.log(`  Bytes Received:        ${snapshot.totalBytesReceived}`);
    console.log(`  Frames From Clients:   ${snapshot.framesFromClients}`);
    console.log(`  Frames Forwarded:      ${snapshot.framesForwarded}`);
    console.log(`  Bus Send Failures:     ${snapshot.busSendFailures}`);
    console.log(`  Bus Frames Received:   ${snapshot.busFramesReceived}`);
    console.log(`  Fan-out Deliveries:    ${snapshot.fanoutDeliveries}`);
    console.log(`  Client Write Failures: ${snapshot.clientWriteFailures}`);
    console.log(`  Truncated Frames:      ${snapshot.truncatedFrames}`);
    console.log(`  Decode Errors:         ${snapshot.decodeErrors}`);
    console.log(`  Dropped Bus Frames:    ${snapshot.droppedBusFrames}`);
    console.log();
  }
}

export const metrics = new Metrics();
