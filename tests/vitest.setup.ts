// Decorated classes are imported directly by unit tests, without the container.
import "reflect-metadata";
