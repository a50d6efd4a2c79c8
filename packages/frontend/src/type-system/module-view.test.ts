/**
 * Tests for type-system module views
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { moduleMetadata, typeMetadata, methodMetadata } from "../testing/metadata.js";
import { namedType } from "../metadata/signatures.js";
import { TypeSystemModule } from "./module-view.js";
import { TypeSystemOptions } from "./options.js";
import {
  DECIMAL_CONSTANT_ATTRIBUTE,
  DYNAMIC_ATTRIBUTE,
  EXTENSION_ATTRIBUTE,
} from "./attribute-types.js";

const string = namedType("System", "String");

const library = moduleMetadata({
  name: "Contoso.Text",
  internalsVisibleTo: ["Contoso.Text.Tests, PublicKey=0024000004800000"],
  types: [
    typeMetadata({
      namespace: "Contoso.Text",
      name: "StringExtensions",
      methods: [
        methodMetadata({
          name: "Shout",
          isStatic: true,
          returnType: string,
          parameters: [{ name: "value", type: string, mode: "none", attributes: [] }],
          attributes: [{ type: EXTENSION_ATTRIBUTE }],
        }),
        methodMetadata({
          name: "Echo",
          isStatic: true,
          returnType: namedType("System", "Object"),
          parameters: [
            {
              name: "value",
              type: namedType("System", "Object"),
              mode: "none",
              attributes: [{ type: DYNAMIC_ATTRIBUTE }],
            },
          ],
        }),
        methodMetadata({ name: "Helper", access: "private", isStatic: true }),
      ],
      fields: [
        {
          name: "Ratio",
          access: "public",
          isStatic: true,
          type: namedType("System", "Decimal", undefined, true),
          attributes: [{ type: DECIMAL_CONSTANT_ATTRIBUTE, arguments: [1, 0, 0, 0, 15] }],
        },
      ],
    }),
    typeMetadata({ namespace: "Contoso.Text", name: "Buffer", accessibility: "internal" }),
    typeMetadata({ namespace: "Contoso.Text", name: "Point", kind: "struct" }),
  ],
});

const open = (options: TypeSystemOptions, name = "Contoso.Text"): TypeSystemModule =>
  new TypeSystemModule({ metadata: { ...library, name }, options });

describe("TypeSystemModule", () => {
  it("should expose identity from metadata", () => {
    const module = open(TypeSystemOptions.Default);
    expect(module.name).to.equal("Contoso.Text");
    expect(module.reference.name).to.equal("Contoso.Text");
    expect(module.isMainModule).to.equal(false);
    expect(module.isSynthetic).to.equal(false);
  });

  it("should list types in metadata order", () => {
    const names = open(TypeSystemOptions.Default).typeDefinitions.map((t) => t.fullName);
    expect(names).to.deep.equal([
      "Contoso.Text.StringExtensions",
      "Contoso.Text.Buffer",
      "Contoso.Text.Point",
    ]);
  });

  it("should mark structs as value types", () => {
    const point = open(TypeSystemOptions.Default).getTypeDefinition("Contoso.Text", "Point");
    expect(point?.isValueType).to.equal(true);
    expect(point?.moduleName).to.equal("Contoso.Text");
  });

  it("should cache definitions by default", () => {
    const module = open(TypeSystemOptions.Default);
    const first = module.findTypeDefinition("Contoso.Text.Point");
    expect(first).to.not.equal(undefined);
    expect(module.findTypeDefinition("Contoso.Text.Point")).to.equal(first);
  });

  it("should build fresh definitions when uncached", () => {
    const module = open(TypeSystemOptions.Default | TypeSystemOptions.Uncached);
    const first = module.findTypeDefinition("Contoso.Text.Point");
    const second = module.findTypeDefinition("Contoso.Text.Point");
    expect(second).to.not.equal(first);
    expect(second).to.deep.equal(first);
  });

  describe("OnlyPublicAPI", () => {
    it("should hide non-public types and members", () => {
      const module = open(TypeSystemOptions.OnlyPublicAPI);
      expect(module.findTypeDefinition("Contoso.Text.Buffer")).to.equal(undefined);
      expect(module.declaresType("Contoso.Text.Buffer")).to.equal(true);
      const methods = module.findTypeDefinition("Contoso.Text.StringExtensions")?.methods;
      expect(methods?.map((m) => m.name)).to.deep.equal(["Shout", "Echo"]);
    });

    it("should show everything without the option", () => {
      const module = open(TypeSystemOptions.None);
      const methods = module.findTypeDefinition("Contoso.Text.StringExtensions")?.methods;
      expect(methods?.map((m) => m.name)).to.deep.equal(["Shout", "Echo", "Helper"]);
      expect(module.findTypeDefinition("Contoso.Text.Buffer")?.accessibility).to.equal("internal");
    });
  });

  describe("extension methods", () => {
    it("should flag static methods carrying ExtensionAttribute", () => {
      const type = open(TypeSystemOptions.Default).findTypeDefinition(
        "Contoso.Text.StringExtensions"
      );
      expect(type?.methods[0]?.isExtensionMethod).to.equal(true);
      expect(type?.methods[2]?.isExtensionMethod).to.equal(false);
      expect(type?.hasExtensionMethods).to.equal(true);
    });

    it("should drop ExtensionAttribute from flagged methods", () => {
      const type = open(TypeSystemOptions.Default).findTypeDefinition(
        "Contoso.Text.StringExtensions"
      );
      expect(type?.methods[0]?.attributes).to.deep.equal([]);
    });

    it("should keep ExtensionAttribute when the option is off", () => {
      const type = open(TypeSystemOptions.None).findTypeDefinition(
        "Contoso.Text.StringExtensions"
      );
      expect(type?.methods[0]?.attributes).to.deep.equal([{ type: EXTENSION_ATTRIBUTE }]);
    });

    it("should not flag anything when the option is off", () => {
      const type = open(TypeSystemOptions.None).findTypeDefinition(
        "Contoso.Text.StringExtensions"
      );
      expect(type?.methods[0]?.isExtensionMethod).to.equal(false);
      expect(type?.hasExtensionMethods).to.equal(false);
    });
  });

  describe("decimal constants", () => {
    it("should decode the field value", () => {
      const type = open(TypeSystemOptions.Default).findTypeDefinition(
        "Contoso.Text.StringExtensions"
      );
      expect(type?.fields[0]?.decimalConstant).to.equal("1.5");
    });

    it("should leave the value undefined when the option is off", () => {
      const type = open(TypeSystemOptions.None).findTypeDefinition(
        "Contoso.Text.StringExtensions"
      );
      expect(type?.fields[0]?.decimalConstant).to.equal(undefined);
    });

    it("should drop the attribute only when its value is decoded", () => {
      const decoded = open(TypeSystemOptions.Default).findTypeDefinition(
        "Contoso.Text.StringExtensions"
      );
      const raw = open(TypeSystemOptions.None).findTypeDefinition(
        "Contoso.Text.StringExtensions"
      );
      expect(decoded?.fields[0]?.attributes).to.deep.equal([]);
      expect(raw?.fields[0]?.attributes.map((a) => a.type)).to.deep.equal([
        DECIMAL_CONSTANT_ATTRIBUTE,
      ]);
    });
  });

  describe("dynamic parameters", () => {
    it("should replace DynamicAttribute with the dynamic type", () => {
      const echo = open(TypeSystemOptions.Default).findTypeDefinition(
        "Contoso.Text.StringExtensions"
      )?.methods[1];
      expect(echo?.parameters[0]?.type).to.deep.equal({ kind: "dynamic" });
      expect(echo?.parameters[0]?.attributes).to.deep.equal([]);
    });

    it("should keep the attribute and object type when the option is off", () => {
      const echo = open(TypeSystemOptions.None).findTypeDefinition(
        "Contoso.Text.StringExtensions"
      )?.methods[1];
      expect(echo?.parameters[0]?.type).to.deep.equal(namedType("System", "Object"));
      expect(echo?.parameters[0]?.attributes).to.deep.equal([{ type: DYNAMIC_ATTRIBUTE }]);
    });
  });

  it("should number parameters by position", () => {
    const shout = open(TypeSystemOptions.Default).findTypeDefinition(
      "Contoso.Text.StringExtensions"
    )?.methods[0];
    expect(shout?.parameters.map((p) => [p.name, p.index])).to.deep.equal([["value", 0]]);
    expect(shout?.isConstructor).to.equal(false);
  });

  describe("internalsVisibleTo", () => {
    it("should match friend names case-insensitively and ignore the key", () => {
      const module = open(TypeSystemOptions.Default);
      expect(module.internalsVisibleTo(open(TypeSystemOptions.Default, "contoso.text.tests"))).to.equal(true);
      expect(module.internalsVisibleTo(open(TypeSystemOptions.Default, "Contoso.Other"))).to.equal(false);
    });

    it("should always grant a module access to itself", () => {
      const module = open(TypeSystemOptions.Default, "Standalone");
      expect(module.internalsVisibleTo(module)).to.equal(true);
    });
  });
});
