import path from "node:path"
import { z } from "zod"
import { flag, integer, integerBetween, nonNegativeInteger, text } from "./safe-coerce"

const channel = () => integerBetween(0, 255)

/**
 * The `camera` section as written in the document, with dotted keys. Every
 * field is required except `tuning.path`.
 */
export const cameraDocument = z.object({
  index: integer(),
  hflip: integer(),
  vflip: integer(),
  sensitivity: integer(),

  "tuning.enabled": flag(),
  "tuning.path": text().optional(),

  "multimedia.path": text().refine((value) => !path.isAbsolute(value), {
    message: "Expected a relative path",
  }),

  "timestamp.enabled": flag(),
  "timestamp.format": text(),
  "timestamp.color": z.tuple([channel(), channel(), channel()]),
  "timestamp.origin": z.tuple([nonNegativeInteger(), nonNegativeInteger()]),
  "timestamp.font": text(),
  "timestamp.fscale": integer(),
  "timestamp.thickness": integer(),

  "image.prefix": text(),
  "image.fmt": text(),
  "image.size": text(),
  "image.snapshots": nonNegativeInteger(),
  "image.snapshots.t": nonNegativeInteger(),
})

/**
 * Camera capture settings. Dotted document keys are grouped on output:
 * `timestamp.fscale` is read as `camera.timestamp.fontScale`.
 */
export const cameraSection = cameraDocument
  .transform((doc) => ({
    index: doc.index,
    hflip: doc.hflip,
    vflip: doc.vflip,
    sensitivity: doc.sensitivity,
    tuning: Object.freeze({
      enabled: doc["tuning.enabled"],
      ...(doc["tuning.path"] !== undefined && { path: doc["tuning.path"] }),
    }),
    multimediaPath: doc["multimedia.path"],
    timestamp: Object.freeze({
      enabled: doc["timestamp.enabled"],
      format: doc["timestamp.format"],
      color: Object.freeze(doc["timestamp.color"]),
      origin: Object.freeze(doc["timestamp.origin"]),
      font: doc["timestamp.font"],
      fontScale: doc["timestamp.fscale"],
      thickness: doc["timestamp.thickness"],
    }),
    image: Object.freeze({
      prefix: doc["image.prefix"],
      format: doc["image.fmt"],
      size: doc["image.size"],
      snapshots: doc["image.snapshots"],
      snapshotInterval: doc["image.snapshots.t"],
    }),
  }))
  .readonly()

export type CameraConfig = z.output<typeof cameraSection>
