// Runs before each test file loads its modules, so env validation sees these values.
process.env.DATABASE_PATH = ":memory:";
process.env.SECRET_KEY = "test-secret-key-for-jest";
process.env.JWT_ALGORITHM = "HS256";
process.env.ACCESS_TOKEN_EXPIRE_MINUTES = "60";
process.env.LOGIN_RATE_LIMIT_MAX = "1000";
process.env.CORS_ORIGINS = "http://localhost:3000";
