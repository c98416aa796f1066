/** A complete `camera` section in document form. */
export function makeCameraDocument(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    index: 0,
    hflip: 0,
    vflip: 1,
    sensitivity: 20,
    "tuning.enabled": false,
    "multimedia.path": "media",
    "timestamp.enabled": true,
    "timestamp.format": "%Y-%m-%d %H:%M:%S",
    "timestamp.color": [255, 255, 255],
    "timestamp.origin": [10, 30],
    "timestamp.font": "FONT_HERSHEY_SIMPLEX",
    "timestamp.fscale": 1,
    "timestamp.thickness": 2,
    "image.prefix": "img",
    "image.fmt": "jpg",
    "image.size": "1920x1080",
    "image.snapshots": 1,
    "image.snapshots.t": 0,
    ...overrides,
  }
}

export function makeCameraDocumentWithout(field: string): Record<string, unknown> {
  const document = makeCameraDocument()
  delete document[field]
  return document
}
