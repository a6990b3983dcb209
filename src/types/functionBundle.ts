import { z } from "zod";

export const FunctionBundleTomlSchema = z.object({
  function: z.object({
    class: z.string().min(1),
    payload_class: z.string(),
    payload_media_type: z.string(),
    return_class: z.string(),
    return_media_type: z.string()
  })
});

/** What the detector reports about the single function it found. */
export interface UnitManifest {
  className: string;
  payloadType: string;
  payloadMediaType: string;
  returnType: string;
  returnMediaType: string;
}
