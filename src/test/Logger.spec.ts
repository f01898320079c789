import { assert } from "chai"
import { createLogger } from "../Logger.js"

describe("Logger tests", () => {
    it("createLogger() filters below the requested level", () => {
        const logger = createLogger("warn")

        assert.strictEqual(logger.level, "warn")
        assert.isTrue(logger.isErrorEnabled())
        assert.isTrue(logger.isWarnEnabled())
        assert.isFalse(logger.isInfoEnabled())
        assert.isFalse(logger.isDebugEnabled())
    })

    it("createLogger() at debug enables every level", () => {
        const logger = createLogger("debug")

        assert.isTrue(logger.isDebugEnabled())
        assert.isTrue(logger.isInfoEnabled())
    })
})
