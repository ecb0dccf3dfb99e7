import {
  extractData,
  newUserForUpdate,
  updateIDs,
  updateLocations,
  updatePhones,
  updateRelations,
} from "../googleUserAttributes";

describe("extractData", () => {
  it("should keep only the email of a minimal user", () => {
    expect(extractData({ primaryEmail: "email@example.com" })).toEqual({
      compareKey: "email@example.com",
      attributes: { email: "email@example.com" },
      changesDisabled: false,
    });
  });

  it("should decode every supported field", () => {
    const person = extractData({
      id: "1029",
      primaryEmail: "email@example.com",
      externalIds: [{ type: "organization", value: "12345" }],
      locations: [{ area: "An area", type: "desk" }],
      name: { familyName: "Jones", fullName: "John Jones", givenName: "John" },
      organizations: [
        { costCenter: "A cost center", department: "A department", title: "A title" },
      ],
      phones: [{ type: "work", value: "555-1212" }],
      relations: [{ type: "manager", value: "manager@example.com" }],
      customSchemas: { Location: { Building: "A building" } },
    });

    expect(person.externalID).toBe("1029");
    expect(person.attributes).toEqual({
      email: "email@example.com",
      familyName: "Jones",
      givenName: "John",
      id: "12345",
      area: "An area",
      costCenter: "A cost center",
      department: "A department",
      title: "A title",
      phone: "555-1212",
      manager: "manager@example.com",
      "Location.Building": "A building",
    });
  });

  it('should only read "organization" external ids', () => {
    const person = extractData({
      primaryEmail: "email@example.com",
      externalIds: [
        { type: "custom", value: "abc123" },
        { type: "organization", value: "12345" },
      ],
    });

    expect(person.attributes).toEqual({ email: "email@example.com", id: "12345" });
  });

  it('should only read "work" phones', () => {
    const person = extractData({
      primaryEmail: "email@example.com",
      phones: [
        { type: "home", value: "555-1212" },
        { type: "work", value: "888-5555" },
      ],
    });

    expect(person.attributes).toEqual({ email: "email@example.com", phone: "888-5555" });
  });

  it('should only read "desk" locations', () => {
    const person = extractData({
      primaryEmail: "email@example.com",
      locations: [
        { area: "Custom area", type: "custom" },
        { area: "An area", type: "desk" },
      ],
    });

    expect(person.attributes).toEqual({ email: "email@example.com", area: "An area" });
  });

  it("should ignore values of an unexpected type", () => {
    const person = extractData({
      primaryEmail: "email@example.com",
      externalIds: [{ type: "organization", value: 12345 }],
      locations: [{ type: "desk", area: 1.0 }],
      organizations: [
        { costCenter: ["A cost center"], department: true, title: { key: "value" } },
      ],
      phones: [{ type: "work", value: 5551212 }],
      relations: [{ type: "manager", value: ["manager@example.com"] }],
      customSchemas: { Location: { Floor: 3 }, Broken: "not an object" },
    });

    expect(person.attributes).toEqual({ email: "email@example.com" });
  });
});

describe("newUserForUpdate", () => {
  it("should build every field from the attributes", () => {
    const user = newUserForUpdate(
      {
        email: "email@example.com",
        familyName: "Jones",
        givenName: "John",
        id: "12345",
        area: "An area",
        costCenter: "A cost center",
        department: "A department",
        title: "A title",
        phone: "555-1212",
        manager: "manager@example.com",
        "Location.Building": "A building",
      },
      {},
    );

    expect(user).toEqual({
      externalIds: [{ type: "organization", value: "12345" }],
      locations: [{ type: "desk", area: "An area" }],
      name: { familyName: "Jones", givenName: "John" },
      organizations: [
        { costCenter: "A cost center", department: "A department", title: "A title" },
      ],
      phones: [{ type: "work", value: "555-1212" }],
      relations: [{ type: "manager", value: "manager@example.com" }],
      customSchemas: { Location: { Building: "A building" } },
    });
  });

  it("should merge organization fields into the existing primary organization", () => {
    const user = newUserForUpdate(
      { department: "New" },
      {
        organizations: [
          { name: "Example", department: "Old", primary: true },
          { name: "Volunteer" },
        ],
      },
    );

    expect(user.organizations).toEqual([
      { name: "Example", department: "New", primary: true },
      { name: "Volunteer" },
    ]);
  });

  it("should reject an attribute it cannot map", () => {
    expect(() => newUserForUpdate({ nickname: "JJ" }, {})).toThrow(
      'unsupported Google user attribute "nickname"',
    );
  });
});

describe("multi-valued field merges", () => {
  it("should replace the organization id and keep custom ids", () => {
    expect(
      updateIDs("12345", [
        { type: "organization", value: "00000" },
        { type: "custom", customType: "foo", value: "abcdef" },
      ]),
    ).toEqual([
      { type: "organization", value: "12345" },
      { type: "custom", customType: "foo", value: "abcdef" },
    ]);
  });

  it("should add an organization id when none exists", () => {
    expect(updateIDs("12345", [{ type: "custom", customType: "foo", value: "abcdef" }])).toEqual([
      { type: "organization", value: "12345" },
      { type: "custom", customType: "foo", value: "abcdef" },
    ]);
  });

  it("should replace the desk area and keep other locations whole", () => {
    const custom = {
      type: "custom",
      customType: "foo",
      area: "Area A",
      buildingId: "Bldg B",
      deskCode: "deskCode",
      floorName: "floorName",
      floorSection: "floorSection",
    };

    expect(updateLocations("Area 2", [{ type: "desk", area: "Area 1" }, custom])).toEqual([
      { type: "desk", area: "Area 2" },
      custom,
    ]);
  });

  it("should replace the work phone and keep other phones", () => {
    expect(
      updatePhones("555-1212", [
        { type: "work", value: "222-333-4444" },
        { type: "custom", customType: "foo", value: "999-111-2222", primary: true },
      ]),
    ).toEqual([
      { type: "work", value: "555-1212" },
      { type: "custom", customType: "foo", value: "999-111-2222", primary: true },
    ]);
  });

  it("should replace the manager and keep other relations", () => {
    expect(
      updateRelations("new_manager@example.com", [
        { type: "manager", value: "old_manager@example.com" },
        { type: "custom", customType: "foo", value: "other@example.com" },
      ]),
    ).toEqual([
      { type: "manager", value: "new_manager@example.com" },
      { type: "custom", customType: "foo", value: "other@example.com" },
    ]);
  });

  it("should start a fresh list when the old value is missing", () => {
    expect(updateRelations("m@example.com", undefined)).toEqual([
      { type: "manager", value: "m@example.com" },
    ]);
  });
});
