import { defineConfig } from "vitest/config"
import { cpus } from "os"

const numCpus = cpus().length

export default defineConfig({
  test: {
    include: ["./test/**/*.test.ts", "./src/**/*.test.ts"],
    globals: true,

    // Forks rather than threads: the suites spawn compilers and target programs
    pool: "forks",
    poolOptions: {
      forks: {
        minForks: 1,
        maxForks: numCpus,
        isolate: true
      }
    },

    // Files run in parallel (each test works in its own temp directory).
    // Tests within a file stay sequential so timeout assertions are not skewed by CPU contention.
    fileParallelism: true,

    testTimeout: 30000,
    hookTimeout: 15000,

    coverage: {
      provider: "v8"
    }
  }
})
