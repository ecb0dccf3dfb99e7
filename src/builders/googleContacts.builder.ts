import { Builder } from "xml2js";
import { PersonAttributes } from "../models/person.model";

export const ATOM_NAMESPACE = "http://www.w3.org/2005/Atom";
export const GDATA_NAMESPACE = "http://schemas.google.com/g/2005";
export const WORK_REL = "http://schemas.google.com/g/2005#work";
const CONTACT_KIND = "http://schemas.google.com/contact/2008#contact";

/**
 * Builds the Atom entry sent when creating or replacing a contact.
 * Every field is written, so attributes absent here are cleared remotely.
 */
export class GoogleContactsBuilder {
  private readonly xmlBuilder: Builder;

  constructor() {
    this.xmlBuilder = new Builder({
      rootName: "atom:entry",
      headless: true,
      renderOpts: { pretty: false },
    });
  }

  buildEntry(attributes: PersonAttributes): string {
    const value = (key: string): string => attributes[key] ?? "";

    return this.xmlBuilder.buildObject({
      $: { "xmlns:atom": ATOM_NAMESPACE, "xmlns:gd": GDATA_NAMESPACE },
      "atom:category": {
        $: { scheme: `${GDATA_NAMESPACE}#kind`, term: CONTACT_KIND },
      },
      "gd:name": {
        "gd:fullName": value("fullName"),
        "gd:givenName": value("givenName"),
        "gd:familyName": value("familyName"),
      },
      "gd:email": {
        $: { rel: WORK_REL, primary: "true", address: value("email") },
      },
      "gd:phoneNumber": {
        $: { rel: WORK_REL, primary: "true" },
        _: value("phoneNumber"),
      },
      "gd:where": {
        $: { valueString: value("where") },
      },
      "gd:organization": {
        $: { rel: WORK_REL, label: "Work", primary: "true" },
        "gd:orgName": value("organization"),
        "gd:orgTitle": value("title"),
        "gd:orgJobDescription": value("jobDescription"),
        "gd:orgDepartment": value("department"),
      },
    });
  }
}
