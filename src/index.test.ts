describe("library entry", () => {
  const saved = process.env.CSV_DEFAULT_MODULE_CREDITS;

  afterEach(() => {
    if (saved === undefined) {
      delete process.env.CSV_DEFAULT_MODULE_CREDITS;
    } else {
      process.env.CSV_DEFAULT_MODULE_CREDITS = saved;
    }
  });

  it("loads without reading the environment", async () => {
    process.env.CSV_DEFAULT_MODULE_CREDITS = "lots";

    await jest.isolateModulesAsync(async () => {
      const library = await import("./index");
      expect(() => library.loadConfig(process.env)).toThrow(
        'Invalid CSV_DEFAULT_MODULE_CREDITS: expected a number, got "lots"'
      );
    });
  });
});
