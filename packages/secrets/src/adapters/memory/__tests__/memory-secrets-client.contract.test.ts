import { describeSecretsClientContract } from "../../../ports/__tests__/secrets-client.contract"
import { MemorySecretsClient } from "../memory-secrets-client"

describeSecretsClientContract({
  name: "MemorySecretsClient",
  make: ({ prefix, secrets }) => ({
    client: new MemorySecretsClient(secrets, { ...(prefix !== undefined && { prefix }) }),
    credentials: { address: "http://vault.test", token: "test-token" },
  }),
})
