import { flag, integer, number, text, toBoolean, toNumber } from "../safe-coerce"

describe("safe coercion", () => {
  describe("integer()", () => {
    it.each([
      [2, 2],
      ["2", 2],
      [" 3 ", 3],
      ["-7", -7],
    ])("accepts %j as %j", (input, expected) => {
      expect(integer().parse(input)).toBe(expected)
    })

    it.each(["two", "", "   ", true, null, 2.5, "2.5", [1], "0x10", "0b101", "0o17", "1_000"])(
      "rejects %j",
      (input) => {
        expect(integer().safeParse(input).success).toBe(false)
      },
    )

    it("reports a non-numeric string as invalid_type", () => {
      const result = integer().safeParse("two")

      expect(result.success).toBe(false)
      expect(result.error?.issues[0]?.code).toBe("invalid_type")
    })
  })

  describe("number()", () => {
    it("accepts decimal strings", () => {
      expect(number().parse("1.25")).toBe(1.25)
      expect(number().parse("+.5")).toBe(0.5)
      expect(number().parse("2e3")).toBe(2000)
    })

    it("leaves non-decimal notations to fail", () => {
      expect(toNumber("0x10")).toBe("0x10")
      expect(number().safeParse("0x10").success).toBe(false)
      expect(number().safeParse("1e999").success).toBe(false)
    })

    it("rejects non-finite strings", () => {
      expect(number().safeParse("Infinity").success).toBe(false)
      expect(number().safeParse("NaN").success).toBe(false)
    })
  })

  describe("flag()", () => {
    it.each([
      [true, true],
      [false, false],
      ["true", true],
      ["FALSE", false],
      [" True ", true],
      [1, true],
      [0, false],
    ])("accepts %j as %j", (input, expected) => {
      expect(flag().parse(input)).toBe(expected)
    })

    it.each(["yes", "1", 2, null, ""])("rejects %j", (input) => {
      expect(flag().safeParse(input).success).toBe(false)
    })
  })

  describe("text()", () => {
    it("passes strings through", () => {
      expect(text().parse("img")).toBe("img")
    })

    it("turns finite numbers into their decimal string", () => {
      expect(text().parse(1080)).toBe("1080")
      expect(text().parse(0.5)).toBe("0.5")
    })

    it.each([true, null, Number.NaN, { a: 1 }])("rejects %j", (input) => {
      expect(text().safeParse(input).success).toBe(false)
    })
  })

  it("leaves values it cannot convert unchanged", () => {
    expect(toNumber("two")).toBe("two")
    expect(toNumber(true)).toBe(true)
    expect(toBoolean("on")).toBe("on")
    expect(toBoolean(2)).toBe(2)
  })
})
