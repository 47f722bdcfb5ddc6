import { LookupError } from "../../../errors/discovery-errors"
import { lookupAlternative } from "../lookup-alternative"

describe("lookupAlternative", () => {
  it("returns the value of the first present key", () => {
    expect(lookupAlternative({ hostname: "10.0.0.5" }, ["host", "hostname"])).toBe("10.0.0.5")
  })

  it("prefers earlier candidates", () => {
    const credentials = { host: "10.0.0.5", hostname: "cache.internal" }

    expect(lookupAlternative(credentials, ["host", "hostname"])).toBe("10.0.0.5")
  })

  it("returns an empty string when no candidate is present", () => {
    expect(lookupAlternative({ user: "admin" }, ["host", "hostname"])).toBe("")
  })

  it("returns an empty string for no candidates", () => {
    expect(lookupAlternative({ host: "10.0.0.5" }, [])).toBe("")
  })

  it("keeps an empty string value instead of moving on", () => {
    expect(lookupAlternative({ host: "", hostname: "cache.internal" }, ["host", "hostname"])).toBe("")
  })

  it("throws LookupError for a non-string value under the first present key", () => {
    const lookup = () => lookupAlternative({ port: 6379 }, ["port"])

    expect(lookup).toThrow(LookupError)
    expect(lookup).toThrow('Credential "port" is a number, expected a string')
  })

  it("does not fall through to later candidates after a non-string value", () => {
    try {
      lookupAlternative({ host: null, hostname: "cache.internal" }, ["host", "hostname"])
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(LookupError)
      expect(err).toMatchObject({
        code: "lookup_error",
        context: { key: "host", actualType: "null" },
      })
    }
  })

  it("ignores inherited properties", () => {
    expect(lookupAlternative({}, ["toString"])).toBe("")
  })
})
