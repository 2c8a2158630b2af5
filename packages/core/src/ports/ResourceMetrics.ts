/** OS metrics; each method resolves undefined when the metric cannot be read. */
export interface ResourceMetricsPort {
  memoryUtilization(): Promise<number | undefined>; // percent
  diskUtilization(): Promise<number | undefined>; // percent
  cpuCount(): Promise<number | undefined>;
  totalMemoryGb(): Promise<number | undefined>;
}
