export interface VideoInfo {
  duration: number; // seconds
  sizeMb: number;
  width: number | null;
  height: number | null;
  codec: string | null;
}
