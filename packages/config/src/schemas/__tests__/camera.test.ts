import { cameraSection } from "../camera"
import { makeCameraDocument, makeCameraDocumentWithout } from "./camera-document"

describe("cameraSection", () => {
  it("groups dotted document keys under camelCase fields", () => {
    expect(cameraSection.parse(makeCameraDocument())).toEqual({
      index: 0,
      hflip: 0,
      vflip: 1,
      sensitivity: 20,
      tuning: { enabled: false },
      multimediaPath: "media",
      timestamp: {
        enabled: true,
        format: "%Y-%m-%d %H:%M:%S",
        color: [255, 255, 255],
        origin: [10, 30],
        font: "FONT_HERSHEY_SIMPLEX",
        fontScale: 1,
        thickness: 2,
      },
      image: {
        prefix: "img",
        format: "jpg",
        size: "1920x1080",
        snapshots: 1,
        snapshotInterval: 0,
      },
    })
  })

  it("coerces lossless values", () => {
    const camera = cameraSection.parse(
      makeCameraDocument({
        index: "1",
        "tuning.enabled": "true",
        "tuning.path": "tuning/imx477.json",
        "multimedia.path": "captures",
        "timestamp.color": [0, "128", 255],
        "timestamp.fscale": "2",
        "image.snapshots": 5,
        "image.snapshots.t": 30,
      }),
    )

    expect(camera.index).toBe(1)
    expect(camera.tuning).toEqual({ enabled: true, path: "tuning/imx477.json" })
    expect(camera.multimediaPath).toBe("captures")
    expect(camera.timestamp.color).toEqual([0, 128, 255])
    expect(camera.timestamp.fontScale).toBe(2)
    expect(camera.image.snapshots).toBe(5)
    expect(camera.image.snapshotInterval).toBe(30)
  })

  it.each(["index", "hflip", "sensitivity", "multimedia.path", "image.size", "image.snapshots.t"])(
    "requires %s",
    (field) => {
      const result = cameraSection.safeParse(makeCameraDocumentWithout(field))

      expect(result.success).toBe(false)
      expect(result.error?.issues).toHaveLength(1)
      expect(result.error?.issues[0]?.path).toEqual([field])
    },
  )

  it("leaves tuning.path optional", () => {
    expect(cameraSection.parse(makeCameraDocumentWithout("tuning.path")).tuning).toEqual({
      enabled: false,
    })
  })

  it("reports every missing field", () => {
    const result = cameraSection.safeParse({ index: 0 })

    expect(result.error?.issues).toHaveLength(17)
    expect(result.error?.issues.every((issue) => issue.code === "invalid_type")).toBe(true)
  })

  it("rejects an absolute multimedia path", () => {
    const result = cameraSection.safeParse(makeCameraDocument({ "multimedia.path": "/var/media" }))

    expect(result.success).toBe(false)
    expect(result.error?.issues[0]).toMatchObject({
      path: ["multimedia.path"],
      message: "Expected a relative path",
    })
  })

  it("rejects out of range colour channels and negative intervals", () => {
    const result = cameraSection.safeParse(
      makeCameraDocument({ "timestamp.color": [0, 256, 0], "image.snapshots.t": -1 }),
    )

    expect(result.error?.issues.map((i) => i.path)).toEqual([
      ["timestamp.color", 1],
      ["image.snapshots.t"],
    ])
  })

  it("rejects a colour with the wrong number of channels", () => {
    const result = cameraSection.safeParse(makeCameraDocument({ "timestamp.color": [0, 0] }))

    expect(result.success).toBe(false)
  })

  it("freezes the result", () => {
    const camera = cameraSection.parse(makeCameraDocument())

    expect(Object.isFrozen(camera)).toBe(true)
    expect(Object.isFrozen(camera.timestamp)).toBe(true)
    expect(Object.isFrozen(camera.timestamp.color)).toBe(true)
    expect(Object.isFrozen(camera.image)).toBe(true)
  })
})
