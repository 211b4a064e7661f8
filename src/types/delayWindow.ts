export interface DelayWindow {
  minSeconds: number;
  maxSeconds: number;
}
