import {
  attributesEqual,
  createPerson,
  normalizeCompareKey,
  pickAttributes,
  withPerson,
} from "../person.model";
import { ChangeCounter, failedChangeResults } from "../change-set.model";

describe("person model", () => {
  describe("createPerson", () => {
    it("should default changesDisabled to false and omit a missing externalID", () => {
      const person = createPerson({ compareKey: "a@x.com" });

      expect(person.changesDisabled).toBe(false);
      expect(person.attributes).toEqual({});
      expect("externalID" in person).toBe(false);
    });

    it("should copy the attributes it is given", () => {
      const attributes = { email: "a@x.com" };
      const person = createPerson({ compareKey: "a@x.com", attributes });
      attributes.email = "changed@x.com";

      expect(person.attributes.email).toBe("a@x.com");
      expect(Object.isFrozen(person)).toBe(true);
    });
  });

  describe("withPerson", () => {
    it("should replace only the given fields", () => {
      const person = createPerson({
        compareKey: "a@x.com",
        externalID: "7",
        attributes: { email: "a@x.com" },
      });

      const disabled = withPerson(person, { changesDisabled: true });

      expect(disabled).toEqual({
        compareKey: "a@x.com",
        externalID: "7",
        attributes: { email: "a@x.com" },
        changesDisabled: true,
      });
      expect(person.changesDisabled).toBe(false);
    });
  });

  describe("normalizeCompareKey", () => {
    it("should lowercase the key", () => {
      expect(normalizeCompareKey("User@Example.com")).toBe("user@example.com");
    });
  });

  describe("attributesEqual", () => {
    it("should treat identical maps as equal", () => {
      expect(attributesEqual({ a: "1", b: "2" }, { b: "2", a: "1" })).toBe(true);
    });

    it("should treat an extra key on either side as a difference", () => {
      expect(attributesEqual({ a: "1" }, { a: "1", b: "2" })).toBe(false);
      expect(attributesEqual({ a: "1", b: "2" }, { a: "1" })).toBe(false);
    });

    it("should compare values case-sensitively", () => {
      expect(attributesEqual({ name: "Ann" }, { name: "ann" })).toBe(false);
    });

    it("should not confuse a missing key with an empty value", () => {
      expect(attributesEqual({ a: "", b: "1" }, { b: "1", c: "" })).toBe(false);
    });
  });

  describe("pickAttributes", () => {
    const attributes = { email: "a@x.com", name: "A", phone: "1" };

    it("should keep everything when no keys are requested", () => {
      expect(pickAttributes(attributes)).toEqual(attributes);
      expect(pickAttributes(attributes, [])).toEqual(attributes);
    });

    it("should keep only requested keys that exist", () => {
      expect(pickAttributes(attributes, ["email", "missing"])).toEqual({ email: "a@x.com" });
    });
  });
});

describe("change results", () => {
  it("should report a failure with zero counters", () => {
    expect(failedChangeResults(new Error("boom"))).toEqual({
      created: 0,
      updated: 0,
      deleted: 0,
      errors: ["boom"],
    });
  });

  it("should tally each kind separately", () => {
    const counter = new ChangeCounter();
    counter.increment("create");
    counter.increment("update");
    counter.increment("update");
    counter.increment("delete");

    expect(counter.toResults()).toEqual({ created: 1, updated: 2, deleted: 1, errors: [] });
  });
});
