type ChalkMock = ((text: string) => string) & { [style: string]: ChalkMock };

// Every style is a pass-through so assertions see the plain text.
const createChainableProxy = (): ChalkMock => {
  const handler: ProxyHandler<ChalkMock> = {
    get: () => createChainableProxy(),
    apply: (_target, _thisArgument, arguments_: unknown[]) =>
      String(arguments_[0]),
  };

  return new Proxy<ChalkMock>(
    Object.assign((text: string) => text, {}) as ChalkMock,
    handler,
  );
};

const chalk = createChainableProxy();

export default chalk;
