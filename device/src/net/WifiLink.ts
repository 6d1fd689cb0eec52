import { RandomSource } from '../sensors/SimulatedSensors';

export interface WifiLink {
  isConnected(): boolean;
  /** RSSI in dBm, null while disconnected */
  signalStrength(): number | null;
}

/**
 * Station-mode link that drops with probability `dropRate` per check and
 * re-associates after `reconnectChecks` further checks.
 */
export class SimulatedWifiLink implements WifiLink {
  private connected = true;
  private checksUntilReconnect = 0;
  private rssi = -58;

  constructor(
    private dropRate: number = 0.02,
    private reconnectChecks: number = 3,
    private random: RandomSource = Math.random
  ) {}

  public isConnected(): boolean {
    if (this.connected) {
      if (this.random() < this.dropRate) {
        this.connected = false;
        this.checksUntilReconnect = this.reconnectChecks;
      }
    } else if (--this.checksUntilReconnect <= 0) {
      this.connected = true;
    }
    return this.connected;
  }

  public signalStrength(): number | null {
    if (!this.connected) return null;
    this.rssi = Math.round(Math.min(-30, Math.max(-90, this.rssi + (this.random() - 0.5) * 4)));
    return this.rssi;
  }
}
