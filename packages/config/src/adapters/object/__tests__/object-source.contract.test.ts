import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: async () => ({
    source: new ObjectSource({ camera: { index: 3 } }),
  }),
  setup: async () => {},
  expectedValue: () => ({ camera: { index: 3 } }),
})
