import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: () => new ObjectSource({ INSTANCE_ID: "00000000000000aa" }),
  expectedValue: { INSTANCE_ID: "00000000000000aa" },
})

describe("ObjectSource", () => {
  it("names itself after its label", () => {
    expect(new ObjectSource({}).name).toBe("object:overrides")
    expect(new ObjectSource({}, "tests").name).toBe("object:tests")
  })
})
