import { GoogleContactsBuilder } from "../googleContacts.builder";
import { parseContactEntry } from "../../parsers/googleContacts.parser";

describe("GoogleContactsBuilder", () => {
  const builder = new GoogleContactsBuilder();

  it("should write the primary work email as an attribute", () => {
    const xml = builder.buildEntry({ email: "a@x.com" });

    expect(xml.startsWith("<atom:entry ")).toBe(true);
    expect(xml).toContain(
      '<gd:email rel="http://schemas.google.com/g/2005#work" primary="true" address="a@x.com"/>',
    );
  });

  it("should escape markup in values", () => {
    const xml = builder.buildEntry({ email: "a@x.com", organization: "R&D <Labs>" });

    expect(xml).toContain("<gd:orgName>R&amp;D &lt;Labs&gt;</gd:orgName>");
  });

  it("should produce an entry the contacts parser reads back", async () => {
    const contact = await parseContactEntry(
      builder.buildEntry({
        email: "a@x.com",
        fullName: "Ann Lee",
        givenName: "Ann",
        familyName: "Lee",
        phoneNumber: "555-0100",
        where: "Room 4",
        organization: "Example Org",
        title: "Engineer",
        jobDescription: "Builds things",
        department: "IT",
      }),
    );

    expect(contact).toEqual({
      selfLink: "",
      etag: "",
      title: "",
      givenName: "Ann",
      familyName: "Lee",
      primaryEmail: "a@x.com",
      primaryPhone: "555-0100",
      where: "Room 4",
      organization: {
        name: "Example Org",
        title: "Engineer",
        jobDescription: "Builds things",
        department: "IT",
      },
    });
  });
});
