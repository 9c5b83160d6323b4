export interface SegmentExtractionRequest {
  sourcePath: string;
  outputPath: string;
  start: number; // seconds
  duration: number; // seconds
}

export interface SegmentExtractionResult {
  success: boolean;
  error?: string;
}

// Cuts one time range out of a source file without re-encoding
export interface ISegmentExtractor {
  extract(request: SegmentExtractionRequest): Promise<SegmentExtractionResult>;
}
