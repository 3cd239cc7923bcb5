import {
    ConfigurationError,
    ConnectorError,
    PersistenceError,
    UnknownSourceError,
    describeError,
} from './errors';

describe('error taxonomy', () => {
    it('names errors after their class and carries a code', () => {
        const error = new UnknownSourceError('kraken_spot');
        expect(error.name).toBe('UnknownSourceError');
        expect(error.code).toBe('UNKNOWN_SOURCE');
        expect(error.message).toBe('Source "kraken_spot" is not configured');
    });

    it('lists configuration issues in the message', () => {
        const error = new ConfigurationError('Invalid settings', ['PORT: must be an integer', 'OUTPUT_FORMATS: unsupported format "xml"']);
        expect(error.issues).toHaveLength(2);
        expect(error.message).toBe('Invalid settings:\n- PORT: must be an integer\n- OUTPUT_FORMATS: unsupported format "xml"');
    });

    it('keeps the failing operation and cause on connector errors', () => {
        const cause = new Error('ETIMEDOUT');
        const error = new ConnectorError('okx', 'fetchTicker(BTC/USDT)', 'NetworkError: ETIMEDOUT', cause);
        expect(error.message).toBe('okx fetchTicker(BTC/USDT) failed: NetworkError: ETIMEDOUT');
        expect(error.cause).toBe(cause);
    });

    it('prefixes errno codes of file system causes', () => {
        const cause = Object.assign(new Error('permission denied'), { code: 'EACCES' });
        const error = new PersistenceError('/data/okx_ticker.csv', 'append', cause);
        expect(error.message).toBe('append /data/okx_ticker.csv failed: EACCES permission denied');
        expect(describeError(error)).toBe(error.message);
    });

    it('describes non-error values', () => {
        expect(describeError('plain text')).toBe('plain text');
        expect(describeError(42)).toBe('42');
    });
});
