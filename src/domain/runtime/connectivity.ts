export interface Connectivity {
  isOnline(): boolean;
}
