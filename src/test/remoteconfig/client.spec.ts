import { expect } from "chai";
import nock from "nock";
import * as sinon from "sinon";

import { AdminError } from "../../error";
import { RemoteConfigClient } from "../../remoteconfig/client";
import { RemoteConfigError, RemoteConfigErrorCode } from "../../remoteconfig/error";
import { RemoteConfigTemplate } from "../../remoteconfig/interfaces";
import { SDK_VERSION } from "../../version";
import { mockCredential, TEST_ACCESS_TOKEN } from "../helpers";

const PROJECT_ID = "the-remoteconfig-test-project";
const ORIGIN = "https://firebaseremoteconfig.googleapis.com";
const TEMPLATE_PATH = `/v1/projects/${PROJECT_ID}/remoteConfig`;
const FCM_ERROR_TYPE = "type.googleapis.com/google.firebase.fcm.v1.FcmError";

// Test sample template, as the service returns it (no etag in the body)
const templateBody = {
  conditions: [
    {
      name: "RCTestCondition",
      expression: "dateTime < dateTime('2020-07-24T00:00:00', 'America/Los_Angeles')",
    },
  ],
  parameters: {
    RCTestkey: {
      defaultValue: {
        value: "RCTestValue",
      },
    },
  },
  version: {
    versionNumber: "6",
    updateTime: "2020-07-23T17:13:11.190Z",
    updateUser: {
      email: "someone@example.com",
    },
    updateOrigin: "CONSOLE",
    updateType: "INCREMENTAL_UPDATE",
  },
  parameterGroups: {
    RCTestCaseGroup: {
      parameters: {
        RCTestKey2: {
          defaultValue: {
            value: "RCTestValue2",
          },
          description: "This is a test",
        },
      },
    },
  },
};

describe("RemoteConfigClient", () => {
  const sandbox = sinon.createSandbox();
  let savedEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    savedEnv = { ...process.env };
    delete process.env.GOOGLE_CLOUD_PROJECT;
    delete process.env.GCLOUD_PROJECT;
  });

  afterEach(() => {
    process.env = savedEnv;
    sandbox.restore();
    expect(nock.isDone()).to.equal(true, "all nock stubs should have been called");
    nock.cleanAll();
  });

  describe("constructor", () => {
    it("should reject an empty project id", () => {
      expect(
        () => new RemoteConfigClient({ projectId: "", credential: mockCredential(sandbox) }),
      ).to.throw(AdminError, /Project ID is required to access Remote Config service/);
    });

    it("should reject a null project id", () => {
      expect(() => new RemoteConfigClient({ projectId: null })).to.throw(
        AdminError,
        /Project ID is required/,
      );
    });

    it("should not contact the service or the credential when the project id is missing", () => {
      const credential = mockCredential(sandbox);

      expect(() => new RemoteConfigClient({ credential })).to.throw(AdminError);
      expect(credential.getAccessToken).to.not.have.been.called;
    });

    it("should build the template url from the project id", () => {
      const client = new RemoteConfigClient({
        projectId: PROJECT_ID,
        credential: mockCredential(sandbox),
      });

      expect(client.getTemplateUrl()).to.equal(`${ORIGIN}${TEMPLATE_PATH}`);
    });

    it("should use a custom api origin", () => {
      const client = new RemoteConfigClient({
        projectId: PROJECT_ID,
        credential: mockCredential(sandbox),
        apiOrigin: "http://localhost:9000/",
      });

      expect(client.getTemplateUrl()).to.equal(`http://localhost:9000${TEMPLATE_PATH}`);
    });
  });

  describe("fromEnvironment", () => {
    it("should prefer the projectId option", async () => {
      process.env.GOOGLE_CLOUD_PROJECT = "env-project";

      const client = await RemoteConfigClient.fromEnvironment({
        projectId: PROJECT_ID,
        credential: mockCredential(sandbox),
      });

      expect(client.getTemplateUrl()).to.equal(`${ORIGIN}${TEMPLATE_PATH}`);
    });

    it("should read GOOGLE_CLOUD_PROJECT before GCLOUD_PROJECT", async () => {
      process.env.GOOGLE_CLOUD_PROJECT = "google-cloud-project";
      process.env.GCLOUD_PROJECT = "gcloud-project";

      const client = await RemoteConfigClient.fromEnvironment({
        credential: mockCredential(sandbox),
      });

      expect(client.getTemplateUrl()).to.equal(
        `${ORIGIN}/v1/projects/google-cloud-project/remoteConfig`,
      );
    });

    it("should fall back to the credential's project", async () => {
      const credential = mockCredential(sandbox, "credential-project");

      const client = await RemoteConfigClient.fromEnvironment({ credential });

      expect(client.getTemplateUrl()).to.equal(
        `${ORIGIN}/v1/projects/credential-project/remoteConfig`,
      );
      expect(credential.getProjectId).to.have.been.calledOnce;
    });

    it("should reject when no project id can be found", async () => {
      await expect(
        RemoteConfigClient.fromEnvironment({ credential: mockCredential(sandbox) }),
      ).to.eventually.be.rejectedWith(AdminError, /GOOGLE_CLOUD_PROJECT environment variable/);
    });
  });

  describe("getTemplate", () => {
    let client: RemoteConfigClient;

    beforeEach(() => {
      client = new RemoteConfigClient({
        projectId: PROJECT_ID,
        credential: mockCredential(sandbox),
      });
    });

    it("should return the latest template with its etag", async () => {
      nock(ORIGIN)
        .get(TEMPLATE_PATH)
        .matchHeader("X-Firebase-Client", `remote-config-admin-node/${SDK_VERSION}`)
        .matchHeader("Authorization", `Bearer ${TEST_ACCESS_TOKEN}`)
        .reply(200, templateBody, { etag: "abc123" });

      const template = await client.getTemplate();

      const expected: RemoteConfigTemplate = {
        conditions: templateBody.conditions,
        parameters: templateBody.parameters,
        parameterGroups: templateBody.parameterGroups,
        version: {
          versionNumber: "6",
          updateTime: "2020-07-23T17:13:11.190Z",
          updateUser: { email: "someone@example.com" },
          updateOrigin: "CONSOLE",
          updateType: "INCREMENTAL_UPDATE",
        },
        etag: "abc123",
      };
      expect(template).to.deep.equal(expected);
    });

    it("should read the etag header case-insensitively", async () => {
      nock(ORIGIN).get(TEMPLATE_PATH).reply(200, templateBody, { ETag: "etag-UPPER-1" });

      const template = await client.getTemplate();

      expect(template.etag).to.equal("etag-UPPER-1");
    });

    it("should default missing template fields", async () => {
      nock(ORIGIN).get(TEMPLATE_PATH).reply(200, {}, { etag: "etag-empty" });

      const template = await client.getTemplate();

      expect(template).to.deep.equal({
        conditions: [],
        parameters: {},
        parameterGroups: {},
        etag: "etag-empty",
      });
    });

    it("should reject a response without an etag", async () => {
      nock(ORIGIN).get(TEMPLATE_PATH).reply(200, templateBody);

      const err = await client.getTemplate().then(
        () => undefined,
        (e: unknown) => e,
      );

      expect(err).to.be.instanceOf(AdminError);
      expect(err).to.not.be.instanceOf(RemoteConfigError);
      expect(err).to.have.property(
        "message",
        `Remote Config template for project ${PROJECT_ID} was returned without an ETag.`,
      );
    });

    it("should not treat a malformed template as a service error", async () => {
      nock(ORIGIN).get(TEMPLATE_PATH).reply(200, "{not json", { etag: "abc123" });

      const err = await client.getTemplate().then(
        () => undefined,
        (e: unknown) => e,
      );

      expect(err).to.be.instanceOf(AdminError);
      expect(err).to.not.be.instanceOf(RemoteConfigError);
      expect(err)
        .to.have.property("message")
        .that.matches(/^Unable to parse Remote Config template/);
    });

    it("should reject a template that is not an object", async () => {
      nock(ORIGIN).get(TEMPLATE_PATH).reply(200, "[]", { etag: "abc123" });

      await expect(client.getTemplate()).to.eventually.be.rejectedWith(
        AdminError,
        "Remote Config service returned a malformed template.",
      );
    });

    it("should map the FcmError code of an error response", async () => {
      nock(ORIGIN)
        .get(TEMPLATE_PATH)
        .reply(500, {
          error: {
            status: "INTERNAL",
            message: "Internal error encountered.",
            details: [{ "@type": FCM_ERROR_TYPE, errorCode: "INTERNAL" }],
          },
        });

      const err = await client.getTemplate().then(
        () => undefined,
        (e: unknown) => e,
      );

      expect(err).to.be.instanceOf(RemoteConfigError);
      if (err instanceof RemoteConfigError) {
        expect(err.remoteConfigErrorCode).to.equal(RemoteConfigErrorCode.INTERNAL);
        expect(err.message).to.equal("HTTP Error: 500, Internal error encountered.");
        expect(err.status).to.equal(500);
        expect(err.exit).to.equal(2);
        expect(err.original).to.be.instanceOf(AdminError);
      }
    });

    it("should leave the code empty for an unknown FcmError code", async () => {
      nock(ORIGIN)
        .get(TEMPLATE_PATH)
        .reply(404, {
          error: {
            status: "NOT_FOUND",
            message: "Requested entity was not found.",
            details: [{ "@type": FCM_ERROR_TYPE, errorCode: "UNREGISTERED" }],
          },
        });

      const err = await client.getTemplate().then(
        () => undefined,
        (e: unknown) => e,
      );

      expect(err).to.be.instanceOf(RemoteConfigError);
      if (err instanceof RemoteConfigError) {
        expect(err.remoteConfigErrorCode).to.be.undefined;
        expect(err.status).to.equal(404);
      }
    });

    it("should keep the HTTP error for a non-JSON error body", async () => {
      nock(ORIGIN).get(TEMPLATE_PATH).reply(503, "Service Unavailable");

      const err = await client.getTemplate().then(
        () => undefined,
        (e: unknown) => e,
      );

      expect(err).to.be.instanceOf(RemoteConfigError);
      if (err instanceof RemoteConfigError) {
        expect(err.remoteConfigErrorCode).to.be.undefined;
        expect(err.message).to.equal("HTTP Error: 503, Service Unavailable");
        expect(err.status).to.equal(503);
      }
    });

    for (const status of [300, 304]) {
      it(`should reject a ${status} reply even when it carries a template and an etag`, async () => {
        nock(ORIGIN).get(TEMPLATE_PATH).reply(status, '{"conditions":[]}', { etag: "e1" });

        const err = await client.getTemplate().then(
          () => undefined,
          (e: unknown) => e,
        );

        expect(err).to.be.instanceOf(RemoteConfigError);
        if (err instanceof RemoteConfigError) {
          expect(err.remoteConfigErrorCode).to.be.undefined;
          expect(err.message).to.equal(`HTTP Error: ${status}, Unknown Error`);
          expect(err.status).to.equal(status);
          expect(err.original).to.be.instanceOf(AdminError);
        }
      });
    }

    it("should wrap a transport failure", async () => {
      nock(ORIGIN).get(TEMPLATE_PATH).replyWithError("connection reset");

      const err = await client.getTemplate().then(
        () => undefined,
        (e: unknown) => e,
      );

      expect(err).to.be.instanceOf(RemoteConfigError);
      if (err instanceof RemoteConfigError) {
        expect(err.remoteConfigErrorCode).to.be.undefined;
        expect(err.message).to.equal(`Failed to make request to ${ORIGIN}${TEMPLATE_PATH}`);
        expect(err.original).to.be.instanceOf(AdminError);
      }
    });

    it("should wrap a credential failure", async () => {
      const credential = mockCredential(sandbox);
      credential.getAccessToken.rejects(new Error("no credentials"));
      const failing = new RemoteConfigClient({ projectId: PROJECT_ID, credential });

      await expect(failing.getTemplate()).to.eventually.be.rejectedWith(
        RemoteConfigError,
        "no credentials",
      );
    });

    it("should serve concurrent requests", async () => {
      nock(ORIGIN).get(TEMPLATE_PATH).reply(200, templateBody, { etag: "first" });
      nock(ORIGIN).get(TEMPLATE_PATH).reply(200, templateBody, { etag: "second" });

      const templates = await Promise.all([client.getTemplate(), client.getTemplate()]);

      expect(templates.map((t) => t.etag).sort()).to.deep.equal(["first", "second"]);
    });
  });
});
