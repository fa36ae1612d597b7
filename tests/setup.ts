// Components log soft failures with console.warn; keep test output readable.
beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => { });
});

afterEach(() => {
    jest.restoreAllMocks();
});
