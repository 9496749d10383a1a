// Keep test output quiet and machine-readable unless a test opts in.
process.env.PRETTY_LOGS ??= 'false'
process.env.LOG_LEVEL ??= 'silent'
