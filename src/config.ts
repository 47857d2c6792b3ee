const config = {
    // Account that holds every pool's reserves on the asset ledger
    exchangeAccount: 'exchange',
    baseAssetSymbol: 'BASE',
    // 1% swap fee taken on the input side
    feeNumerator: 100,
    feeDenominator: 10000,
    // Amounts are unsigned 64-bit, intermediates unsigned 128-bit
    maxAmount: '18446744073709551615',
    maxWideValue: '340282366920938463463374607431768211455',
    accountNameMaxLength: 64,
    accountNameMinLength: 1,
    // Characters that would break compound document ids
    accountNameForbiddenChars: '|',
    tokenContractMaxLength: 64,
    tokenContractAllowedChars: '<>,0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ-_.',
    tokenIdMaxLength: 64,
    tokenIdAllowedChars: '0123456789abcdef',
    eventIdLength: 24,
};

export default config;
