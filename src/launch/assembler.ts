import { DEFAULT_JAVA_COMMAND } from "../detection/invoker";
import { LaunchDescriptor } from "../types/launch";

/** Expanded by the launch shell, never at build time. */
export const PORT_PLACEHOLDER = "${PORT:-8080}";

export function assembleLaunch(
  runtimeJarPath: string,
  functionLayerPath: string,
  javaCommand: string = DEFAULT_JAVA_COMMAND
): LaunchDescriptor {
  return {
    processType: "web",
    command: `${javaCommand} -jar ${runtimeJarPath} serve ${functionLayerPath} -p ${PORT_PLACEHOLDER}`,
    args: [],
    isDefault: true
  };
}
