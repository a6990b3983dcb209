export interface LaunchDescriptor {
  processType: string;
  command: string;
  args: string[];
  isDefault: boolean;
}
